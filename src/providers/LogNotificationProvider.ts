/**
 * Notification provider that writes every notification to the log.
 * Used by the worker, where no user session is attached.
 */

import type { ILogProvider } from './ILogProvider.js';
import type { INotificationProvider } from './INotificationProvider.js';

export class LogNotificationProvider implements INotificationProvider {
  constructor(private readonly logger: ILogProvider) {}

  async notifyQuotaLimit(resourceName: string, resetAt: Date): Promise<void> {
    this.logger.warn(`${resourceName} limit reached`, {
      notification: 'quota_limit',
      resourceName,
      resetAt: resetAt.toISOString(),
    });
  }

  async notifyWarning(text: string): Promise<void> {
    this.logger.warn(text, { notification: 'warning' });
  }

  async notifyInfo(text: string): Promise<void> {
    this.logger.info(text, { notification: 'info' });
  }

  async notifySuccess(text: string): Promise<void> {
    this.logger.info(text, { notification: 'success' });
  }
}
