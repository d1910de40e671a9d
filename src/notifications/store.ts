// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION STORE — Persistence for In-App Notifications
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { loggers } from '../logging/index.js';
import { getStore, type KeyValueStore } from '../storage/index.js';
import {
  DEFAULT_PRIORITY,
  NotificationSchema,
  type Notification,
  type NotificationPresenter,
  type ShowNotificationRequest,
} from './types.js';

const logger = loggers.notifier();

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

const NOTIFICATION_TTL = 7 * 24 * 60 * 60;     // 7 days
const MAX_LIST_RETURN = 100;

// ─────────────────────────────────────────────────────────────────────────────────
// KEY GENERATION
// ─────────────────────────────────────────────────────────────────────────────────

function notificationKey(id: string): string {
  return `notification:${id}`;
}

function channelListKey(channel: string): string {
  return `notification:channel:${channel}:list`;
}

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATION STORE CLASS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Notifications kept in the key-value store, newest first per channel.
 */
export class InAppNotificationPresenter implements NotificationPresenter {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async show(request: ShowNotificationRequest): Promise<Notification> {
    const notification: Notification = {
      id: uuidv4(),
      channel: request.channel,
      kind: request.kind,
      title: request.title,
      body: request.body,
      priority: request.priority ?? DEFAULT_PRIORITY[request.kind],
      ongoing: request.ongoing ?? false,
      action: request.action,
      createdAt: new Date().toISOString(),
    };

    await this.store.set(notificationKey(notification.id), JSON.stringify(notification), NOTIFICATION_TTL);
    await this.store.lpush(channelListKey(notification.channel), notification.id);

    logger.debug('Notification shown', { id: notification.id, kind: notification.kind });
    return notification;
  }

  async get(id: string): Promise<Notification | null> {
    const data = await this.store.get(notificationKey(id));
    if (!data) return null;

    const parsed = NotificationSchema.safeParse(parseJson(data));
    if (!parsed.success) {
      logger.warn('Discarding malformed notification', { id });
      return null;
    }
    return parsed.data;
  }

  async cancel(id: string): Promise<boolean> {
    const notification = await this.get(id);
    if (!notification) return false;

    await this.store.delete(notificationKey(id));
    await this.store.lrem(channelListKey(notification.channel), 0, id);
    return true;
  }

  async list(channel: string, limit: number = MAX_LIST_RETURN): Promise<Notification[]> {
    const ids = await this.store.lrange(channelListKey(channel), 0, limit - 1);
    const notifications: Notification[] = [];

    for (const id of ids) {
      const notification = await this.get(id);
      if (notification) notifications.push(notification);
    }

    return notifications;
  }
}
