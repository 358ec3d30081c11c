/**
 * Background worker: keeps the quota ledger rolled over at each UTC midnight
 * and sweeps expired suggestions. Runs until SIGINT or SIGTERM.
 */

import { getProductionContainer } from './container.production.js';
import { describeError } from './errors.js';

const container = await getProductionContainer();
const { quotaLedger, quotaResetScheduler, logProvider } = container;

// Catch up if the process starts after a missed midnight.
const startup = await quotaResetScheduler.runOnce();
logProvider.info('Worker started', { ...startup, quota: quotaLedger.status() });

quotaResetScheduler.start();

async function shutdown(signal: string): Promise<void> {
  logProvider.info('Worker shutting down', { signal });
  try {
    await quotaResetScheduler.stop();
  } catch (err) {
    logProvider.error('Scheduler did not stop cleanly', { error: describeError(err) });
  }
  await logProvider.flush();
  process.exit(0);
}

process.once('SIGINT', (s) => void shutdown(s));
process.once('SIGTERM', (s) => void shutdown(s));
