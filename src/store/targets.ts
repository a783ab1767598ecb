import type { ApiState, CheckRecord, Target, TargetProvider } from '../types';
import { KeyedMutex } from './mutex';

export const HISTORY_LIMIT = 100;

export interface NewTarget {
  name: string;
  url: string;
  provider?: TargetProvider | undefined;
  description?: string | undefined;
  tags?: string[] | undefined;
  apiUrl?: string | null | undefined;
  apiType?: string | undefined;
  /** Discovery-source router this target was synced from */
  routerName?: string | null | undefined;
}

export class DuplicateTargetError extends Error {
  constructor(name: string) {
    super(`Target "${name}" already exists`);
    this.name = 'DuplicateTargetError';
  }
}

export class TargetNotFoundError extends Error {
  constructor(name: string) {
    super(`Target "${name}" not found`);
    this.name = 'TargetNotFoundError';
  }
}

function initialApiState(input: NewTarget): ApiState {
  return {
    url: input.apiUrl ?? null,
    type: input.apiType ?? '',
    detected: false,
    endpoint: '',
    lastDetected: null,
    detectionAttempts: 0,
    nextCheck: null,
  };
}

/**
 * In-memory arena of targets keyed by name.
 *
 * Writes go through `update`, which serializes read-modify-write cycles per target and swaps in
 * a fresh record, so a reader holding a record never sees a half-applied change.
 */
export class TargetStore {
  private readonly targets = new Map<string, Target>();
  private readonly checks = new Map<string, CheckRecord[]>();
  private readonly locks = new KeyedMutex();

  constructor(private readonly now: () => number = Date.now) {}

  create(input: NewTarget): Target {
    if (this.targets.has(input.name)) {
      throw new DuplicateTargetError(input.name);
    }
    const timestamp = this.now();
    const target: Target = {
      name: input.name,
      url: input.url,
      provider: input.provider ?? 'manual',
      routerName: input.routerName ?? null,
      description: input.description ?? '',
      tags: input.tags ?? [],
      status: 'unknown',
      lastChecked: null,
      statusChangedAt: null,
      responseTime: null,
      api: initialApiState(input),
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.targets.set(target.name, target);
    this.checks.set(target.name, []);
    return structuredClone(target);
  }

  get(name: string): Target | undefined {
    const target = this.targets.get(name);
    return target ? structuredClone(target) : undefined;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  findByRouter(routerName: string): Target | undefined {
    for (const target of this.targets.values()) {
      if (target.routerName === routerName) return structuredClone(target);
    }
    return undefined;
  }

  list(): Target[] {
    return [...this.targets.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((target) => structuredClone(target));
  }

  /** Removes the target together with its check history */
  delete(name: string): boolean {
    this.checks.delete(name);
    return this.targets.delete(name);
  }

  async update(name: string, mutate: (current: Target) => Target | Promise<Target>): Promise<Target> {
    const [target] = await this.modify<undefined>(name, async (current) => [await mutate(current), undefined]);
    return target;
  }

  /**
   * Read-modify-write that also hands back a value computed alongside the new record
   */
  async modify<R>(name: string, mutate: (current: Target) => Promise<[Target, R]>): Promise<[Target, R]> {
    return this.locks.run(name, async () => {
      const current = this.targets.get(name);
      if (!current) {
        throw new TargetNotFoundError(name);
      }
      const [next, result] = await mutate(structuredClone(current));
      // Deleted, or deleted and re-created, while mutate was awaiting
      if (this.targets.get(name) !== current) {
        throw new TargetNotFoundError(name);
      }
      const stored: Target = { ...next, name, updatedAt: this.now() };
      this.targets.set(name, stored);
      return [structuredClone(stored), result];
    });
  }

  recordCheck(name: string, record: CheckRecord): void {
    const records = this.checks.get(name);
    if (!records) return;
    records.unshift(record);
    if (records.length > HISTORY_LIMIT) {
      records.length = HISTORY_LIMIT;
    }
  }

  history(name: string): CheckRecord[] {
    return (this.checks.get(name) ?? []).map((record) => ({ ...record }));
  }
}
