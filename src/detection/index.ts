import { createLogger } from '../log';
import type { CredentialVault } from '../store/secrets';
import type { TargetStore } from '../store/targets';
import type { ScanResult, Target } from '../types';
import { getErrorMessage, inferApiType, normalizeBaseUrl } from '../utils';
import { scanEndpoints } from './scanner';
import { detectionGate, recordDetectionFailure, recordDetectionSuccess } from './schedule';

const log = createLogger('Detector');

type DetectionStep =
  | { kind: 'already-configured' }
  | { kind: 'skipped'; reason: 'fresh' | 'throttled'; nextCheck: number | null }
  | { kind: 'detected'; via: 'manual-credentials' | 'scan' }
  | { kind: 'not-found'; reason: 'target-down' | 'no-endpoint' | 'error' };

export type DetectionOutcome = DetectionStep & { target: Target };

export interface DetectorDeps {
  store: TargetStore;
  vault: CredentialVault;
  scan?: ((baseUrl: string) => Promise<ScanResult>) | undefined;
  now?: (() => number) | undefined;
}

export interface DetectOptions {
  force?: boolean | undefined;
}

/**
 * Decides whether a target exposes an API and keeps its detection backoff state.
 */
export class ApiDetector {
  private readonly store: TargetStore;
  private readonly vault: CredentialVault;
  private readonly scan: (baseUrl: string) => Promise<ScanResult>;
  private readonly now: () => number;

  constructor(deps: DetectorDeps) {
    this.store = deps.store;
    this.vault = deps.vault;
    this.scan = deps.scan ?? ((baseUrl) => scanEndpoints(baseUrl));
    this.now = deps.now ?? Date.now;
  }

  async detect(name: string, options: DetectOptions = {}): Promise<DetectionOutcome> {
    const force = options.force ?? false;
    const [target, step] = await this.store.modify<DetectionStep>(name, async (current) => {
      const step = await this.evaluate(current, force);
      return [current, step];
    });
    return { ...step, target };
  }

  /** Mutates `current` in place; runs under the target's write lock */
  private async evaluate(current: Target, force: boolean): Promise<DetectionStep> {
    const { name, api } = current;
    const now = this.now();

    if (!force && api.detected && api.type && api.url && this.vault.hasAnyCredentials(name)) {
      log.info('API already configured', { name, type: api.type });
      return { kind: 'already-configured' };
    }

    // Operator-supplied credentials prove the API exists; no probing
    if (this.vault.hasManualCredentials(name)) {
      current.api = recordDetectionSuccess(api, { type: api.type || inferApiType(name), endpoint: api.endpoint }, now);
      current.api.url ??= normalizeBaseUrl(current.url);
      log.debug('Manual API configuration', { name, type: current.api.type });
      return { kind: 'detected', via: 'manual-credentials' };
    }

    const gate = detectionGate(api, force, now);
    if (!gate.due) {
      log.debug('Skipping API detection', {
        name,
        reason: gate.reason,
        attempts: api.detectionAttempts,
        nextCheck: gate.nextCheck,
      });
      return { kind: 'skipped', reason: gate.reason, nextCheck: gate.nextCheck };
    }

    if (current.status === 'down') {
      current.api = recordDetectionFailure(api, now);
      log.info('Target down, counting as failed detection', { name, attempts: current.api.detectionAttempts });
      return { kind: 'not-found', reason: 'target-down' };
    }

    log.info('Starting API detection', { name, url: current.url, reason: gate.reason });
    let result: ScanResult;
    try {
      result = await this.scan(current.url);
    } catch (error) {
      current.api = recordDetectionFailure(api, now);
      log.warn('API detection failed', {
        name,
        error: getErrorMessage(error),
        attempts: current.api.detectionAttempts,
      });
      return { kind: 'not-found', reason: 'error' };
    }

    if (result.found && result.endpoint !== null) {
      current.api = recordDetectionSuccess(api, { type: api.type || inferApiType(name), endpoint: result.endpoint }, now);
      current.api.url ??= normalizeBaseUrl(current.url);
      log.info('API detected', { name, type: current.api.type, endpoint: result.endpoint });
      return { kind: 'detected', via: 'scan' };
    }

    current.api = recordDetectionFailure(api, now);
    log.info('No API detected', {
      name,
      attempts: current.api.detectionAttempts,
      nextCheck: current.api.nextCheck === null ? null : new Date(current.api.nextCheck).toISOString(),
    });
    return { kind: 'not-found', reason: 'no-endpoint' };
  }
}
