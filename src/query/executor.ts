import type { BulkAction, BulkActionReport, StreamMutator } from '../protocol';
import { errorMessage } from '../errors';
import { logger } from '../utils/logger';
import type { StreamSummary } from './predicate';

const log = logger.child('bulk');

/**
 * Applies `action` to every stream, one call at a time, in the given order.
 * A failed call is tallied and the batch moves on. Read-only mode is the
 * caller's concern.
 */
export async function executeBulkAction(
  action: BulkAction,
  matched: readonly StreamSummary[],
  mutator: StreamMutator
): Promise<BulkActionReport> {
  const report: BulkActionReport = {
    action,
    attempted: 0,
    succeeded: 0,
    failed: 0,
    failures: [],
  };

  log.info(`Bulk ${action} started on ${matched.length} streams`);

  for (const stream of matched) {
    report.attempted++;
    try {
      if (action === 'delete') {
        await mutator.deleteStream(stream.name);
      } else {
        await mutator.purgeStream(stream.name);
      }
      report.succeeded++;
    } catch (e) {
      const reason = errorMessage(e);
      log.warn(`${action} '${stream.name}' failed: ${reason}`);
      report.failed++;
      report.failures.push({ name: stream.name, reason });
    }
  }

  log.info(`Bulk ${action} complete. Succeeded: ${report.succeeded}, Failed: ${report.failed}`);
  return report;
}
