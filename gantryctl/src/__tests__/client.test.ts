/**
 * API Client Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { GantryAPIClient, createAPIClient, unwrap } from '../api/client.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const SELECTION = {
  runnerKey: 'mac-docker',
  explanation: {
    decisionId: 'decision-1',
    jobName: 'build',
    feasibleRunners: ['mac-docker', 'linux-docker'],
    onlineRunners: ['mac-docker'],
    selectedRunner: 'mac-docker',
    recommendedTag: 'mac-docker',
    confidence: 0.5,
    symbolicReasoning: 'Job requires: docker',
    statisticalReasoning: 'Exploring mac-docker',
    algorithm: 'ucb1',
    meanReward: 0,
    value: null,
    pulls: 0,
    degraded: [],
    capacityRequested: false,
    solveTimeMs: 0.2,
    decidedAt: '2024-05-01T12:00:00.000Z',
  },
};

describe('GantryAPIClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send the job with the bearer token', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: unknown) => jsonResponse(200, SELECTION));
    vi.stubGlobal('fetch', fetchMock);

    const client = new GantryAPIClient({ baseUrl: 'http://dispatcher:3000/', token: 'test-secret' });
    const response = await client.selectRunner({ tags: ['docker'] });

    expect(response).toEqual({ ok: true, status: 200, data: SELECTION });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://dispatcher:3000/api/select',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ tags: ['docker'] }),
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      })
    );
  });

  it('should surface the server message on errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(422, {
      error: 'UnknownRunnerError',
      message: 'Cannot record outcome for unknown runner: ghost',
    })));

    const client = createAPIClient({ apiUrl: 'http://dispatcher:3000' });
    const response = await client.reportOutcome({ runnerKey: 'ghost', success: true, durationSeconds: 1 });

    expect(response).toEqual({
      ok: false,
      status: 422,
      error: 'Cannot record outcome for unknown runner: ghost',
    });
  });

  it('should reject bodies of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(200, { runnerKey: 'mac-docker' })));

    const client = new GantryAPIClient({ baseUrl: 'http://dispatcher:3000' });
    const response = await client.selectRunner({});

    expect(response).toEqual({
      ok: false,
      status: 200,
      error: 'Unexpected response from POST /api/select',
    });
  });

  it('should report network failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:3000');
    }));

    const client = new GantryAPIClient({ baseUrl: 'http://127.0.0.1:3000' });
    const response = await client.getStats();

    expect(response).toEqual({ ok: false, status: 0, error: 'connect ECONNREFUSED 127.0.0.1:3000' });
  });

  it('should encode runner keys and capability filters', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: unknown) => jsonResponse(200, { runners: [], count: 0, implications: {} }));
    vi.stubGlobal('fetch', fetchMock);

    const client = new GantryAPIClient({ baseUrl: 'http://dispatcher:3000' });
    await client.listFleet({ capability: 'eu-north' });
    await client.getRunner('mac mini');

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      'http://dispatcher:3000/api/fleet?capability=eu-north',
      'http://dispatcher:3000/api/fleet/mac%20mini',
    ]);
  });

  it('should parse probe results', async () => {
    const probe = { kind: 'unknown', reason: 'No GitLab API token configured', checkedAt: '2024-05-01T12:00:00.000Z' };
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(200, probe)));

    const client = new GantryAPIClient({ baseUrl: 'http://dispatcher:3000' });

    expect(unwrap(await client.getAvailability())).toEqual(probe);
  });
});

describe('unwrap', () => {
  it('should return data of successful responses', () => {
    expect(unwrap({ ok: true, status: 200, data: { reset: true } })).toEqual({ reset: true });
  });

  it('should throw the error of failed responses', () => {
    expect(() => unwrap({ ok: false, status: 503, error: 'State backend unavailable' })).toThrow(
      'State backend unavailable'
    );
  });
});
