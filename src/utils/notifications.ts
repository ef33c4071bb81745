/**
 * Notification fan-out shared by the undo manager and the workspace
 */

import { logger } from './logger';
import {
  type HistoryNotification,
  type NotificationCallback,
  type NotificationSeverity,
  type NotificationType
} from '../types/common';

class HistoryNotificationImpl implements HistoryNotification {
  public timestamp: Date;

  constructor(
    public type: NotificationType,
    public severity: NotificationSeverity,
    public message: string,
    public metadata: Record<string, unknown> = {}
  ) {
    this.timestamp = new Date();
  }
}

class NotificationHub {
  private callbacks: NotificationCallback[] = [];

  subscribe(callback: NotificationCallback): void {
    this.callbacks.push(callback);
  }

  emit(
    type: NotificationType,
    severity: NotificationSeverity,
    message: string,
    metadata: Record<string, unknown> = {}
  ): HistoryNotification {
    const notification = new HistoryNotificationImpl(type, severity, message, metadata);
    for (const callback of this.callbacks) {
      try {
        callback(notification);
      } catch (error) {
        logger.error('Notification callback error:', error);
      }
    }
    return notification;
  }
}

export { HistoryNotificationImpl, NotificationHub };
