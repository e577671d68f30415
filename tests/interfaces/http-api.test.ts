import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import { loadSettings } from '../../src/infrastructure/config/index.js';
import { UpstreamError } from '../../src/infrastructure/upstream/index.js';
import { openSqliteInvocationStore } from '../../src/infrastructure/index.js';
import type { StoreOpener, UpstreamClient } from '../../src/infrastructure/index.js';

const settings = loadSettings({ AUDIT_DB_PATH: ':memory:', LOG_LEVEL: 'silent' });

let app: FastifyInstance | undefined;

async function start(
  get: UpstreamClient['get'] = vi.fn().mockResolvedValue('{"skills":[]}'),
  openStore?: StoreOpener,
): Promise<FastifyInstance> {
  app = await buildApp({ settings, upstream: { get }, openStore });
  return app;
}

function invoke(server: FastifyInstance, name: string, args: Record<string, unknown> = {}) {
  return server.inject({
    method: 'POST',
    url: `/api/v1/operations/${name}`,
    payload: { arguments: args },
    headers: { 'x-session-id': 's-1', 'x-client-name': 'test-client', 'x-client-version': ' ' },
  });
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

// ─── health and catalog ──────────────────────────────────────

describe('GET /health', () => {
  it('reports ok', async () => {
    const server = await start();

    const res = await server.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });
});

describe('GET /api/v1/operations', () => {
  it('lists talent and audit operations', async () => {
    const server = await start();

    const res = await server.inject({ method: 'GET', url: '/api/v1/operations' });
    const body: { operations: { name: string; audited: boolean }[] } = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.operations).toHaveLength(16);
    expect(body.operations.find((o) => o.name === 'audit_summary')?.audited).toBe(false);
  });
});

// ─── invoking operations ─────────────────────────────────────

describe('POST /api/v1/operations/:name', () => {
  it('returns the upstream body and records the call', async () => {
    const server = await start();

    const res = await invoke(server, 'get_employee_skills', { employee_id: 'EMP000001' });
    await server.dispatcher.drain();

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ operation: 'get_employee_skills', result: '{"skills":[]}' });

    const recent = await server.inject({ method: 'GET', url: '/api/v1/audit/recent' });
    expect(recent.json()).toMatchObject({
      data: [
        {
          id: 1,
          operation_name: 'get_employee_skills',
          session_id: 's-1',
          client_name: 'test-client',
          client_version: null,
          arguments: '{"employee_id":"EMP000001"}',
          status: 'success',
          error_detail: null,
        },
      ],
      pagination: { limit: 50, count: 1 },
    });
  });

  it('maps upstream failures to 502 and records them as errors', async () => {
    const failure = new UpstreamError('Upstream GET /tm/skills failed with status 500', '/tm/skills', 500, 'boom');
    const server = await start(vi.fn().mockRejectedValue(failure));

    const res = await invoke(server, 'browse_skills');
    await server.dispatcher.drain();

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      error: 'Upstream GET /tm/skills failed with status 500',
      upstream_status: 500,
    });

    const errors = await server.inject({ method: 'GET', url: '/api/v1/audit/invocations?errors_only=true' });
    expect(errors.json()).toMatchObject({
      data: [
        {
          operation_name: 'browse_skills',
          status: 'error',
          error_detail: 'Upstream GET /tm/skills failed with status 500',
        },
      ],
    });
  });

  it('returns 404 for unknown operations and records nothing', async () => {
    const server = await start();

    const res = await invoke(server, 'drop_tables');
    await server.dispatcher.drain();

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Unknown operation: drop_tables' });
    expect(server.auditStore.initialized).toBe(false);
  });

  it('returns 400 for invalid arguments', async () => {
    const server = await start();

    const res = await invoke(server, 'get_top_experts', { skill_id: 'abc' });

    expect(res.statusCode).toBe(400);
  });

  it('returns 400 when arguments is not an object', async () => {
    const server = await start();

    const res = await server.inject({
      method: 'POST',
      url: '/api/v1/operations/browse_skills',
      payload: { arguments: ['x'] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'Validation failed' });
  });

  it('does not record audit operations', async () => {
    const server = await start();

    await invoke(server, 'get_employee_skills', { employee_id: 'EMP000001' });
    await server.dispatcher.drain();
    const res = await invoke(server, 'audit_summary');
    await server.dispatcher.drain();

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ operation: 'audit_summary', result: { total: 1 } });

    const summary = await server.inject({ method: 'GET', url: '/api/v1/audit/summary' });
    expect(summary.json()).toMatchObject({ total: 1, unique_operations: 1 });
  });

  it('still answers when the audit store cannot be opened', async () => {
    const server = await start(undefined, vi.fn().mockRejectedValue(new Error('read-only file system')));

    const res = await invoke(server, 'get_employee_skills', { employee_id: 'EMP000001' });
    await server.dispatcher.drain();

    expect(res.statusCode).toBe(200);
  });
});

// ─── shutdown ────────────────────────────────────────────────

describe('shutdown', () => {
  it('does not reopen the store for a write that finishes after close', async () => {
    let release: (body: string) => void = () => undefined;
    const get = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    );
    const open = vi.fn(() => openSqliteInvocationStore({ path: ':memory:' }));
    const server = await start(get, open);

    await server.inject({ method: 'GET', url: '/api/v1/audit/summary' });
    const inFlight = invoke(server, 'get_employee_skills', { employee_id: 'EMP000001' }).then(
      (res) => res.statusCode,
    );
    await vi.waitFor(() => expect(get).toHaveBeenCalledTimes(1));

    await server.close();
    app = undefined;
    release('{}');
    await inFlight;
    await server.dispatcher.drain();

    expect(open).toHaveBeenCalledTimes(1);
    expect(server.auditStore.initialized).toBe(false);
    expect(server.auditStore.isClosed).toBe(true);
  });
});

// ─── audit API ───────────────────────────────────────────────

describe('audit API', () => {
  it('returns an empty page from a fresh store', async () => {
    const server = await start();

    const res = await server.inject({ method: 'GET', url: '/api/v1/audit/recent' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: [], pagination: { limit: 50, count: 0 } });
  });

  it('rejects a bad since with 400 without opening the store', async () => {
    const server = await start();

    const res = await server.inject({ method: 'GET', url: '/api/v1/audit/invocations?since=not-a-date' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'Invalid query parameters',
      issues: [{ parameter: 'since', message: 'must be a valid ISO-8601 timestamp' }],
    });
    expect(server.auditStore.initialized).toBe(false);
  });

  it('rejects a negative limit with 400', async () => {
    const server = await start();

    const res = await server.inject({ method: 'GET', url: '/api/v1/audit/recent?limit=-5' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'Invalid query parameters',
      issues: [{ parameter: 'limit', message: 'must be a positive integer' }],
    });
  });

  it('returns 503 when the store cannot be opened', async () => {
    const server = await start(undefined, vi.fn().mockRejectedValue(new Error('read-only file system')));

    const res = await server.inject({ method: 'GET', url: '/api/v1/audit/summary' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      error: 'Failed to initialize audit store',
      code: 'AUDIT_INIT_FAILED',
    });
  });

  it('summarizes successes and failures per operation', async () => {
    const get = vi
      .fn()
      .mockResolvedValueOnce('{}')
      .mockResolvedValueOnce('{}')
      .mockResolvedValueOnce('{}')
      .mockRejectedValueOnce(new UpstreamError('Upstream GET /tm/skills failed: fetch failed', '/tm/skills', null));
    const server = await start(get);

    for (let i = 0; i < 4; i++) {
      await invoke(server, 'browse_skills');
    }
    await server.dispatcher.drain();

    const res = await server.inject({ method: 'GET', url: '/api/v1/audit/summary' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      total: 4,
      error_count: 1,
      error_rate: 0.25,
      unique_operations: 1,
      unique_sessions: 1,
      unique_clients: 1,
      per_operation: [{ operation_name: 'browse_skills', count: 4, error_count: 1, error_rate: 0.25 }],
    });
  });

  it('filters by operation name', async () => {
    const server = await start();

    await invoke(server, 'get_employee_skills', { employee_id: 'EMP000001' });
    await invoke(server, 'browse_skills');
    await invoke(server, 'get_employee_skills', { employee_id: 'EMP000002' });
    await server.dispatcher.drain();

    const res = await server.inject({
      method: 'GET',
      url: '/api/v1/audit/invocations?operation_name=get_employee_skills&limit=1',
    });

    expect(res.json()).toMatchObject({
      data: [{ operation_name: 'get_employee_skills', arguments: '{"employee_id":"EMP000002"}' }],
      pagination: { limit: 1, count: 1 },
    });
  });
});
