// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION TYPES — In-App Notifications
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATION TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export const NotificationKindSchema = z.enum(['progress', 'success', 'failure', 'notice']);

export type NotificationKind = z.infer<typeof NotificationKindSchema>;

export const NotificationPrioritySchema = z.enum(['low', 'medium', 'high']);

export type NotificationPriority = z.infer<typeof NotificationPrioritySchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATION MODEL
// ─────────────────────────────────────────────────────────────────────────────────

export const NotificationActionSchema = z.object({
  type: z.enum(['share', 'open']),
  label: z.string(),
  uri: z.string(),
  mimeType: z.string().optional(),
});

export type NotificationAction = z.infer<typeof NotificationActionSchema>;

export const NotificationSchema = z.object({
  id: z.string(),
  channel: z.string(),

  // Content
  kind: NotificationKindSchema,
  title: z.string(),
  body: z.string().optional(),

  priority: NotificationPrioritySchema,
  /** Progress notifications stay until cancelled */
  ongoing: z.boolean(),

  action: NotificationActionSchema.optional(),

  createdAt: z.string(),
});

export type Notification = z.infer<typeof NotificationSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// SHOW NOTIFICATION REQUEST
// ─────────────────────────────────────────────────────────────────────────────────

export interface ShowNotificationRequest {
  channel: string;
  kind: NotificationKind;
  title: string;
  body?: string;
  priority?: NotificationPriority;
  ongoing?: boolean;
  action?: NotificationAction;
}

export const DEFAULT_PRIORITY: Record<NotificationKind, NotificationPriority> = {
  progress: 'low',
  success: 'medium',
  failure: 'high',
  notice: 'medium',
};

/**
 * Whatever surfaces notifications to the user.
 */
export interface NotificationPresenter {
  show(request: ShowNotificationRequest): Promise<Notification>;
  cancel(id: string): Promise<boolean>;
}
