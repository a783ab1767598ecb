import { createLogger } from '../log';
import type { TargetStore } from '../store/targets';
import type { CheckRecord, ProbeOutcome, Target } from '../types';
import { getErrorMessage } from '../utils';
import { probeUrl } from './http';

const log = createLogger('Checker');

export type Prober = (name: string, url: string) => Promise<ProbeOutcome>;

/**
 * Probe a stored target and apply the verdict.
 *
 * `statusChangedAt` moves only when the verdict differs from the previous one. A scheme
 * fallback that came back up rewrites the stored URL.
 */
export async function checkTarget(
  store: TargetStore,
  name: string,
  prober: Prober = probeUrl,
  now: () => number = Date.now,
): Promise<Target> {
  const [updated, record] = await store.modify<CheckRecord>(name, async (target) => {
    let outcome: ProbeOutcome;
    try {
      outcome = await prober(target.name, target.url);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error('Unexpected error', { name, error: message });
      outcome = {
        status: 'down',
        responseTime: null,
        url: target.url,
        error: { kind: 'unexpected', message },
      };
    }

    const checkedAt = now();
    if (outcome.status !== target.status) {
      log.info('Status changed', { name, from: target.status, to: outcome.status });
      target.statusChangedAt = checkedAt;
    }
    if (outcome.url !== target.url) {
      log.info('Rewrote URL after scheme fallback', { name, from: target.url, to: outcome.url });
      target.url = outcome.url;
    }

    target.status = outcome.status;
    target.responseTime = outcome.responseTime;
    target.lastChecked = checkedAt;

    const record: CheckRecord = {
      status: outcome.status,
      responseTime: outcome.responseTime,
      checkedAt,
      error: outcome.error?.message ?? '',
    };
    return [target, record];
  });

  // Only a verdict that was actually stored enters the history
  store.recordCheck(name, record);
  return updated;
}
