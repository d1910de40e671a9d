// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATIONS MODULE — In-App Notifications
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  NotificationKind,
  NotificationPriority,
  Notification,
  NotificationAction,
  ShowNotificationRequest,
  NotificationPresenter,
} from './types.js';

export {
  NotificationSchema,
  NotificationActionSchema,
  DEFAULT_PRIORITY,
} from './types.js';

// Store
export { InAppNotificationPresenter } from './store.js';
