import { checkTarget } from './checkers';
import type { ApiDetector } from './detection';
import { createLogger } from './log';
import { syncTargets } from './registry/sync';
import type { TargetSource } from './registry/traefik';
import type { TargetStore } from './store/targets';
import type { Target } from './types';
import { getErrorMessage } from './utils';

const log = createLogger('Scheduler');

export const DEFAULT_INTERVAL_MS = 30_000;

export interface SchedulerDeps {
  store: TargetStore;
  detector: ApiDetector;
  /** Discovery source synced at the start of every tick */
  source?: TargetSource | undefined;
  check?: ((name: string) => Promise<Target>) | undefined;
  intervalMs?: number | undefined;
  detectOnTick?: boolean | undefined;
}

export interface TickSummary {
  synced: number;
  probed: number;
  skipped: number;
  detected: number;
  failed: number;
}

/**
 * Periodic probe loop. A tick syncs the discovery source, then probes targets concurrently and
 * runs detection for each target after its probe. A target whose previous cycle is still
 * running is skipped rather than queued.
 */
export class ProbeScheduler {
  private readonly store: TargetStore;
  private readonly detector: ApiDetector;
  private readonly source: TargetSource | undefined;
  private readonly check: (name: string) => Promise<Target>;
  private readonly intervalMs: number;
  private readonly detectOnTick: boolean;

  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly inFlight = new Set<string>();

  constructor(deps: SchedulerDeps) {
    this.store = deps.store;
    this.detector = deps.detector;
    this.source = deps.source;
    this.check = deps.check ?? ((name) => checkTarget(deps.store, name));
    this.intervalMs = deps.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.detectOnTick = deps.detectOnTick ?? true;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    log.info('Starting', { intervalMs: this.intervalMs, detectOnTick: this.detectOnTick });
    this.timer = setInterval(() => this.runTick(), this.intervalMs);
    this.runTick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Stopped');
  }

  private runTick(): void {
    this.tick().catch((error: unknown) => {
      log.error('Tick failed', { error: getErrorMessage(error) });
    });
  }

  async tick(): Promise<TickSummary> {
    const summary: TickSummary = { synced: 0, probed: 0, skipped: 0, detected: 0, failed: 0 };

    if (this.source) {
      // Detection waits for each target's probe in cycle()
      const sync = await syncTargets(this.source, this.store, this.detector, { detect: false });
      summary.synced = sync.synced;
    }

    const names = this.store.list().map((target) => target.name);
    await Promise.all(names.map((name) => this.cycle(name, summary)));

    log.debug('Tick complete', { ...summary });
    return summary;
  }

  private async cycle(name: string, summary: TickSummary): Promise<void> {
    if (this.inFlight.has(name)) {
      log.debug('Previous cycle still running, skipping', { name });
      summary.skipped++;
      return;
    }

    this.inFlight.add(name);
    try {
      await this.check(name);
      summary.probed++;

      if (this.detectOnTick) {
        const outcome = await this.detector.detect(name);
        if (outcome.kind === 'detected') summary.detected++;
      }
    } catch (error) {
      summary.failed++;
      log.error('Cycle failed', { name, error: getErrorMessage(error) });
    } finally {
      this.inFlight.delete(name);
    }
  }
}
