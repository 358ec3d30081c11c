import type { INotificationProvider } from '../../src/providers/INotificationProvider.js';

export type NotificationType = 'quota_limit' | 'warning' | 'info' | 'success';

export interface RecordedNotification {
  type: NotificationType;
  text: string;
  resetAt?: Date;
}

export class MockNotificationProvider implements INotificationProvider {
  readonly notifications: RecordedNotification[] = [];
  /** When set, every call rejects with this error. */
  failWith: Error | null = null;

  async notifyQuotaLimit(resourceName: string, resetAt: Date): Promise<void> {
    this.push({ type: 'quota_limit', text: resourceName, resetAt });
  }

  async notifyWarning(text: string): Promise<void> {
    this.push({ type: 'warning', text });
  }

  async notifyInfo(text: string): Promise<void> {
    this.push({ type: 'info', text });
  }

  async notifySuccess(text: string): Promise<void> {
    this.push({ type: 'success', text });
  }

  // ── Test Helpers ──

  ofType(type: NotificationType): RecordedNotification[] {
    return this.notifications.filter((n) => n.type === type);
  }

  clear(): void {
    this.notifications.length = 0;
  }

  private push(notification: RecordedNotification): void {
    if (this.failWith) throw this.failWith;
    this.notifications.push(notification);
  }
}
