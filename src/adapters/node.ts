import { serve } from '@hono/node-server';
import { ConfigError, loadConfig } from '../config';
import { createLogger, setLogLevel } from '../log';
import { createRuntime } from '../runtime';

const log = createLogger('Server');

function start(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { app, scheduler, source } = createRuntime(config);

  log.info('Starting', {
    port: config.port,
    auth: config.authToken ? 'enabled' : 'disabled',
    discovery: source.isConfigured() ? 'traefik' : 'manual',
    intervalMs: config.intervalMs,
  });

  const server = serve({ fetch: app.fetch, port: config.port });
  scheduler.start();

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    scheduler.stop();
    server.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  start();
} catch (error) {
  if (error instanceof ConfigError) {
    log.error('Invalid configuration', { error: error.message });
    process.exitCode = 1;
  } else {
    throw error;
  }
}
