import { ApiClients } from './api-client';
import { createApp } from './app';
import type { AppConfig } from './config';
import { ApiDetector } from './detection';
import { TraefikSource } from './registry/traefik';
import { ProbeScheduler } from './scheduler';
import { CredentialVault, MemorySecretStore, type SecretStore } from './store/secrets';
import { TargetStore } from './store/targets';

export interface RuntimeOverrides {
  secrets?: SecretStore | undefined;
}

/**
 * Wire the store, detector, scheduler and HTTP app from a loaded config
 */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}) {
  const store = new TargetStore();
  const vault = new CredentialVault(overrides.secrets ?? new MemorySecretStore());
  const detector = new ApiDetector({ store, vault });
  const clients = new ApiClients(store, vault);
  const source = new TraefikSource(config.traefik);
  const scheduler = new ProbeScheduler({
    store,
    detector,
    source: source.isConfigured() ? source : undefined,
    intervalMs: config.intervalMs,
    detectOnTick: config.detectOnTick,
  });
  const app = createApp({ store, vault, detector, clients, scheduler, source, authToken: config.authToken });

  return { app, clients, detector, scheduler, source, store, vault };
}
