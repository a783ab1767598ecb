import type { ApiDetector } from '../detection';
import { createLogger } from '../log';
import type { TargetStore } from '../store/targets';
import type { Target } from '../types';
import { getErrorMessage } from '../utils';
import type { DiscoveredTarget, TargetSource } from './traefik';

const log = createLogger('Sync');

export interface SyncSummary {
  configured: boolean;
  available: boolean;
  synced: number;
  created: number;
}

export interface SyncOptions {
  /** Run detection on each synced target; the scheduler turns this off and detects after probing */
  detect?: boolean | undefined;
  forceDetection?: boolean | undefined;
}

/**
 * The target a router already owns, or a manual target of the same name that no router has
 * claimed yet
 */
function claimedTarget(store: TargetStore, entry: DiscoveredTarget): Target | undefined {
  const owned = store.findByRouter(entry.routerName);
  if (owned) return owned;
  const sameName = store.get(entry.name);
  return sameName && sameName.routerName === null ? sameName : undefined;
}

/** Create or refresh the target for one router and return its name */
async function syncEntry(store: TargetStore, entry: DiscoveredTarget, summary: SyncSummary): Promise<string> {
  const existing = claimedTarget(store, entry);
  if (existing) {
    await store.update(existing.name, (target) => ({
      ...target,
      url: entry.url,
      tags: entry.tags,
      routerName: entry.routerName,
    }));
    log.info('Updated target', { name: existing.name, router: entry.routerName });
    return existing.name;
  }

  // Two routers can clean up to the same display name; the router name is unique
  const name = store.has(entry.name) ? entry.routerName : entry.name;
  store.create({ name, url: entry.url, provider: 'traefik', tags: entry.tags, routerName: entry.routerName });
  summary.created++;
  log.info('Created target', { name, url: entry.url, router: entry.routerName });
  return name;
}

/**
 * Pull targets from a discovery source into the store, matched on router name, and by default
 * run detection on each. An unconfigured or unreachable source leaves the store untouched
 * (manual mode).
 */
export async function syncTargets(
  source: TargetSource,
  store: TargetStore,
  detector: ApiDetector,
  options: SyncOptions = {},
): Promise<SyncSummary> {
  const summary: SyncSummary = { configured: source.isConfigured(), available: false, synced: 0, created: 0 };
  if (!summary.configured) {
    log.debug('Discovery source not configured, using manual target management', { source: source.name });
    return summary;
  }

  summary.available = await source.isAvailable();
  if (!summary.available) {
    log.info('Discovery source not available, using manual target management', { source: source.name });
    return summary;
  }

  const discovered = await source.discover();
  if (!discovered.ok) {
    log.warn('Discovery failed', { source: source.name, error: discovered.error.message });
    return summary;
  }

  const detect = options.detect ?? true;
  for (const entry of discovered.value) {
    try {
      const name = await syncEntry(store, entry, summary);
      if (detect) {
        await detector.detect(name, { force: options.forceDetection });
      }
      summary.synced++;
    } catch (error) {
      log.error('Error syncing target', { name: entry.name, error: getErrorMessage(error) });
    }
  }

  return summary;
}
