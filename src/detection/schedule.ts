import type { ApiState } from '../types';

export const THROTTLE_AFTER_ATTEMPTS = 5;
export const RETRY_WINDOW_MS = 5 * 60 * 1000;
export const REVERIFY_AFTER_MS = 7 * 24 * 60 * 60 * 1000;

export type DetectionGate =
  | { due: true; reason: 'forced' | 'never-detected' | 'retry-window' | 'reverify' }
  | { due: false; reason: 'fresh' | 'throttled'; nextCheck: number | null };

/**
 * Decide whether a detection attempt is due for a target's API state
 */
export function detectionGate(api: ApiState, force: boolean, now: number): DetectionGate {
  if (force) return { due: true, reason: 'forced' };

  // Periodic re-verification overrides throttling
  if (api.lastDetected !== null && now - api.lastDetected > REVERIFY_AFTER_MS) {
    return { due: true, reason: 'reverify' };
  }

  if (api.detected) return { due: false, reason: 'fresh', nextCheck: null };

  if (api.detectionAttempts >= THROTTLE_AFTER_ATTEMPTS) {
    if (api.nextCheck !== null && now < api.nextCheck) {
      return { due: false, reason: 'throttled', nextCheck: api.nextCheck };
    }
    return { due: true, reason: 'retry-window' };
  }

  return { due: true, reason: 'never-detected' };
}

export function shouldDetect(api: ApiState, force: boolean, now: number = Date.now()): boolean {
  return detectionGate(api, force, now).due;
}

export function recordDetectionSuccess(
  api: ApiState,
  found: { type: string; endpoint: string },
  now: number,
): ApiState {
  return {
    ...api,
    detected: true,
    type: found.type,
    endpoint: found.endpoint,
    lastDetected: now,
    detectionAttempts: 0,
    nextCheck: null,
  };
}

export function recordDetectionFailure(api: ApiState, now: number): ApiState {
  const detectionAttempts = api.detectionAttempts + 1;
  return {
    ...api,
    detected: false,
    detectionAttempts,
    nextCheck: detectionAttempts >= THROTTLE_AFTER_ATTEMPTS ? now + RETRY_WINDOW_MS : api.nextCheck,
  };
}
