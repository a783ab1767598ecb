import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import type { ApiClients } from './api-client';
import { checkTarget } from './checkers';
import type { ApiDetector } from './detection';
import { createLogger } from './log';
import type { TargetSource } from './registry/traefik';
import type { ProbeScheduler } from './scheduler';
import type { CredentialVault } from './store/secrets';
import { DuplicateTargetError, TargetNotFoundError, type TargetStore } from './store/targets';
import type { Target } from './types';
import { getErrorMessage, normalizeBaseUrl } from './utils';

const log = createLogger('App');

export interface AppDeps {
  store: TargetStore;
  vault: CredentialVault;
  detector: ApiDetector;
  clients: ApiClients;
  scheduler: ProbeScheduler;
  source?: TargetSource | undefined;
  /** Bearer token for mutating routes; unset leaves them open */
  authToken?: string | undefined;
}

function timingSafeEqual(a: string, b: string): boolean {
  const aBytes = new TextEncoder().encode(a);
  const bBytes = new TextEncoder().encode(b);
  const maxLen = Math.max(aBytes.length, bBytes.length);

  let diff = aBytes.length ^ bBytes.length;
  for (let i = 0; i < maxLen; i++) {
    diff |= (aBytes[i] ?? 0) ^ (bBytes[i] ?? 0);
  }
  return diff === 0;
}

const urlString = z.string().trim().min(1, 'url is required').url('url must be a valid URL');

const CredentialsSchema = z.object({
  apiKey: z.string().optional(),
  apiType: z.string().optional(),
  apiUrl: z.string().optional(),
  password: z.string().optional(),
  username: z.string().optional(),
});

const CreateTargetSchema = CredentialsSchema.extend({
  description: z.string().optional(),
  name: z.string().trim().min(1, 'name must be a non-empty string').max(255),
  tags: z.array(z.string()).optional(),
  url: urlString,
});

const UpdateTargetSchema = z.object({
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  url: urlString.optional(),
});

type ParseResult<T> = { ok: true; data: T } | { ok: false; error: string };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ParseResult<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const path = firstIssue?.path.join('.') || '';
    const message = firstIssue?.message ?? 'Invalid request body';
    return { ok: false, error: path ? `${path}: ${message}` : message };
  }
  return { ok: true, data: result.data };
}

async function readJson(c: Context): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    const body: unknown = await c.req.json();
    return { ok: true, body };
  } catch {
    return { ok: false };
  }
}

function iso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

function toView(target: Target, vault: CredentialVault) {
  return {
    name: target.name,
    url: target.url,
    provider: target.provider,
    routerName: target.routerName,
    description: target.description,
    tags: target.tags,
    status: target.status,
    responseTime: target.responseTime,
    lastChecked: iso(target.lastChecked),
    statusChangedAt: iso(target.statusChangedAt),
    api: {
      url: target.api.url,
      type: target.api.type,
      detected: target.api.detected,
      endpoint: target.api.endpoint,
      lastDetected: iso(target.api.lastDetected),
      detectionAttempts: target.api.detectionAttempts,
      nextCheck: iso(target.api.nextCheck),
    },
    hasCredentials: vault.hasAnyCredentials(target.name),
  };
}

function normalizeApiUrl(value: string): string | null {
  return value.trim() ? normalizeBaseUrl(value) : null;
}

export function createApp(deps: AppDeps) {
  const { store, vault, detector, clients, scheduler, source } = deps;
  const app = new Hono();

  const requireTarget = (name: string): Target => {
    const target = store.get(name);
    if (!target) throw new TargetNotFoundError(name);
    return target;
  };

  app.use('/*', cors());

  app.onError((error, c) => {
    if (error instanceof TargetNotFoundError) {
      return c.json({ error: error.message }, 404);
    }
    if (error instanceof DuplicateTargetError) {
      return c.json({ error: error.message }, 409);
    }
    const message = getErrorMessage(error);
    log.error('Error', { path: c.req.path, error: message });
    return c.json({ error: message }, 500);
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: Date.now() });
  });

  app.get('/', (c) => {
    return c.json({
      endpoints: {
        'GET /': 'This info page',
        'GET /health': 'Health check',
        'GET /targets': 'List targets with liveness and API state',
        'GET /targets/:name': 'Show one target',
        'GET /targets/:name/history': 'Recent checks of a target',
        'POST /targets': 'Add a target',
        'PATCH /targets/:name': 'Update a target',
        'DELETE /targets/:name': 'Remove a target and its history',
        'PUT /targets/:name/credentials': 'Set API credentials',
        'POST /targets/:name/check': 'Probe a target now',
        'POST /targets/:name/detect': 'Run API detection (?force=true to bypass throttling)',
        'POST /targets/:name/authenticate': 'Discover a working login method',
        'POST /refresh': 'Sync discovery source and probe every target',
      },
      name: 'service-radar',
      version: '1.0.0',
    });
  });

  if (deps.authToken) {
    const expectedAuth = `Bearer ${deps.authToken}`;

    app.use('*', async (c, next) => {
      if (c.req.method === 'GET' || c.req.method === 'HEAD') {
        return next();
      }
      const auth = c.req.header('Authorization') ?? '';
      if (!timingSafeEqual(auth, expectedAuth)) {
        log.info('Unauthorized request', { method: c.req.method, path: c.req.path });
        return c.json({ error: 'Unauthorized' }, 401);
      }
      return next();
    });
  }

  app.get('/targets', (c) => {
    const targets = store.list();
    return c.json({
      targets: targets.map((target) => toView(target, vault)),
      total: targets.length,
      up: targets.filter((target) => target.status === 'up').length,
      down: targets.filter((target) => target.status === 'down').length,
      api: targets.filter((target) => target.api.detected).length,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/targets/:name', (c) => {
    return c.json(toView(requireTarget(c.req.param('name')), vault));
  });

  app.get('/targets/:name/history', (c) => {
    const name = c.req.param('name');
    requireTarget(name);
    const checks = store.history(name).map((record) => ({ ...record, checkedAt: iso(record.checkedAt) }));
    return c.json({ name, checks });
  });

  app.post('/targets', async (c) => {
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: 'Invalid JSON body' }, 400);

    const parsed = parseWith(CreateTargetSchema, json.body);
    if (!parsed.ok) return c.json({ error: parsed.error }, 400);

    const input = parsed.data;
    const target = store.create({
      name: input.name,
      url: input.url,
      description: input.description,
      tags: input.tags,
      apiUrl: input.apiUrl ? normalizeApiUrl(input.apiUrl) : null,
      apiType: input.apiType,
    });
    vault.set(target.name, { username: input.username, password: input.password, apiKey: input.apiKey });
    log.info('Created target', { name: target.name, url: target.url });

    return c.json(toView(target, vault), 201);
  });

  app.patch('/targets/:name', async (c) => {
    const name = c.req.param('name');
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: 'Invalid JSON body' }, 400);

    const parsed = parseWith(UpdateTargetSchema, json.body);
    if (!parsed.ok) return c.json({ error: parsed.error }, 400);

    const { url, description, tags } = parsed.data;
    const target = await store.update(name, (current) => ({
      ...current,
      url: url ?? current.url,
      description: description ?? current.description,
      tags: tags ?? current.tags,
    }));
    clients.invalidate(name);
    return c.json(toView(target, vault));
  });

  app.delete('/targets/:name', (c) => {
    const name = c.req.param('name');
    if (!store.delete(name)) throw new TargetNotFoundError(name);
    vault.clear(name);
    clients.invalidate(name);
    log.info('Deleted target', { name });
    return c.json({ success: true, name });
  });

  app.put('/targets/:name/credentials', async (c) => {
    const name = c.req.param('name');
    requireTarget(name);

    const json = await readJson(c);
    if (!json.ok) return c.json({ error: 'Invalid JSON body' }, 400);

    const parsed = parseWith(CredentialsSchema, json.body);
    if (!parsed.ok) return c.json({ error: parsed.error }, 400);

    const { apiUrl, apiType, username, password, apiKey } = parsed.data;
    await store.update(name, (current) => {
      if (apiUrl !== undefined) current.api.url = normalizeApiUrl(apiUrl);
      if (apiType !== undefined) current.api.type = apiType;
      return current;
    });
    vault.set(name, { username, password, apiKey });
    clients.invalidate(name);

    return c.json({ success: true, message: 'Credentials updated successfully' });
  });

  app.post('/targets/:name/check', async (c) => {
    const target = await checkTarget(store, c.req.param('name'));
    return c.json({
      name: target.name,
      status: target.status,
      responseTime: target.responseTime,
      lastChecked: iso(target.lastChecked),
      url: target.url,
    });
  });

  app.post('/targets/:name/detect', async (c) => {
    const force = c.req.query('force') === 'true';
    const { target, ...outcome } = await detector.detect(c.req.param('name'), { force });
    return c.json({ outcome, target: toView(target, vault) });
  });

  app.post('/targets/:name/authenticate', async (c) => {
    const name = c.req.param('name');
    requireTarget(name);
    if (!vault.hasAnyCredentials(name)) {
      return c.json({ error: 'API credentials not configured' }, 400);
    }

    const result = await clients.authenticate(name);
    if (!result.ok) {
      return c.json({ error: result.error.message, kind: result.error.kind }, 502);
    }
    return c.json({ success: true, method: result.value });
  });

  app.post('/refresh', async (c) => {
    const summary = await scheduler.tick();
    const configured = source?.isConfigured() ?? false;
    return c.json({
      success: true,
      ...summary,
      discoveryConfigured: configured,
      info: configured ? undefined : 'Using manual target management',
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
