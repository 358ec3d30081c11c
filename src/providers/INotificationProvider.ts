/**
 * User-facing notification sink.
 * Messages are short and non-technical; technical detail goes to the log.
 */

import type { ILogProvider } from './ILogProvider.js';

export interface INotificationProvider {
  /** A metered resource ran out; usage resumes at `resetAt`. */
  notifyQuotaLimit(resourceName: string, resetAt: Date): Promise<void>;
  notifyWarning(text: string): Promise<void>;
  notifyInfo(text: string): Promise<void>;
  notifySuccess(text: string): Promise<void>;
}

/**
 * Run a notification without letting it fail the caller.
 * Rejections are logged at warn level.
 */
export async function safeNotify(
  logger: ILogProvider,
  send: () => Promise<void>
): Promise<void> {
  try {
    await send();
  } catch (err) {
    logger.warn('Notification delivery failed', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
