import { z } from 'zod';

const DEFAULT_PORT = 3000;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === undefined || value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive('PORT must be a positive integer').default(DEFAULT_PORT),
  SERVICE_RADAR_TOKEN: optionalString,
  PROBE_INTERVAL_SECONDS: z.coerce
    .number()
    .positive('PROBE_INTERVAL_SECONDS must be a positive number')
    .default(30),
  DETECT_ON_TICK: booleanFlag,
  TRAEFIK_API_URL: optionalString,
  TRAEFIK_API_USERNAME: optionalString,
  TRAEFIK_API_PASSWORD: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  port: number;
  authToken: string | undefined;
  intervalMs: number;
  detectOnTick: boolean;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  traefik: {
    apiUrl: string | undefined;
    username: string | undefined;
    password: string | undefined;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const path = firstIssue?.path.join('.') || '';
    const message = firstIssue?.message ?? 'Invalid environment';
    throw new ConfigError(path ? `${path}: ${message}` : message);
  }

  const data = result.data;
  return {
    port: data.PORT,
    authToken: data.SERVICE_RADAR_TOKEN,
    intervalMs: data.PROBE_INTERVAL_SECONDS * 1000,
    detectOnTick: data.DETECT_ON_TICK,
    logLevel: data.LOG_LEVEL,
    traefik: {
      apiUrl: data.TRAEFIK_API_URL,
      username: data.TRAEFIK_API_USERNAME,
      password: data.TRAEFIK_API_PASSWORD,
    },
  };
}
