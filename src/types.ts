export type LivenessStatus = 'up' | 'down' | 'unknown';

export type TargetProvider = 'manual' | 'traefik';

export interface ApiState {
  /** Explicit API base URL; falls back to the target URL when null */
  url: string | null;
  type: string;
  detected: boolean;
  /** Path that answered the endpoint scan */
  endpoint: string;
  lastDetected: number | null;
  /** Consecutive failed detection attempts */
  detectionAttempts: number;
  /** Throttle gate, set once attempts reach the limit */
  nextCheck: number | null;
}

export interface Target {
  name: string;
  url: string;
  provider: TargetProvider;
  /** Set for targets synced from a discovery source; the sync key */
  routerName: string | null;
  description: string;
  tags: string[];
  status: LivenessStatus;
  lastChecked: number | null;
  statusChangedAt: number | null;
  /** Milliseconds; null when the last check failed outright */
  responseTime: number | null;
  api: ApiState;
  createdAt: number;
  updatedAt: number;
}

export interface CheckRecord {
  status: LivenessStatus;
  responseTime: number | null;
  checkedAt: number;
  error: string;
}

export interface Credentials {
  username?: string | undefined;
  password?: string | undefined;
  apiKey?: string | undefined;
}

export type FailureKind =
  | 'timeout'
  | 'connection'
  | 'tls'
  | 'http-status'
  | 'authentication'
  | 'malformed-response'
  | 'unexpected';

export interface Failure {
  kind: FailureKind;
  message: string;
  status?: number;
  body?: string;
}

export type Result<T, E = Failure> = { ok: true; value: T } | { ok: false; error: E };

export interface ProbeOutcome {
  status: LivenessStatus;
  responseTime: number | null;
  /** URL that produced the verdict; differs from the input after a scheme fallback */
  url: string;
  error?: Failure;
}

export interface ScanResult {
  found: boolean;
  endpoint: string | null;
}
