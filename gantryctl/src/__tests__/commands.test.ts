/**
 * Command Tests
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import type { SelectionResponse, StatsReport } from '@gantry/shared';
import { createCLI } from '../cli.js';
import { buildJobDeclaration, formatBandit, pipelineRows, renderSelection } from '../commands/select.js';
import { parseReportOptions } from '../commands/report.js';
import { statsRows } from '../commands/stats.js';
import { buildRegistration } from '../commands/fleet.js';
import { renderProbe } from '../commands/availability.js';

function selection(overrides: Partial<SelectionResponse['explanation']> = {}): SelectionResponse {
  const explanation: SelectionResponse['explanation'] = {
    decisionId: 'decision-1',
    jobName: 'build',
    feasibleRunners: ['mac-docker', 'linux-docker'],
    onlineRunners: ['mac-docker'],
    selectedRunner: 'mac-docker',
    recommendedTag: 'mac-docker',
    confidence: 0.5,
    symbolicReasoning: 'Job requires: docker\nFeasible runners: 2',
    statisticalReasoning: 'Exploring mac-docker',
    algorithm: 'ucb1',
    meanReward: 0,
    value: null,
    pulls: 0,
    degraded: [],
    capacityRequested: false,
    solveTimeMs: 0.2,
    decidedAt: '2024-05-01T12:00:00.000Z',
    ...overrides,
  };
  return { runnerKey: explanation.selectedRunner, explanation };
}

beforeAll(() => {
  chalk.level = 0;
});

describe('select', () => {
  it('should build a declaration from options', () => {
    expect(
      buildJobDeclaration({
        name: 'build',
        tags: 'docker, linux,,',
        image: 'node:20-alpine',
        service: ['postgres:16'],
        timeout: '1h 30m',
        var: ['CI_RUNNER_MEMORY=8Gi', 'EMPTY='],
      })
    ).toEqual({
      name: 'build',
      tags: ['docker', 'linux'],
      image: 'node:20-alpine',
      services: ['postgres:16'],
      timeout: '1h 30m',
      variables: { CI_RUNNER_MEMORY: '8Gi', EMPTY: '' },
    });
  });

  it('should pass plain numeric timeouts as seconds', () => {
    expect(buildJobDeclaration({ timeout: '600' })).toEqual({ timeout: 600 });
  });

  it('should build an empty declaration without options', () => {
    expect(buildJobDeclaration({})).toEqual({});
  });

  it('should reject variables without a key', () => {
    expect(() => buildJobDeclaration({ var: ['=value'] })).toThrow('Invalid variable "=value", expected KEY=VALUE');
  });

  it('should render the explanation', () => {
    const lines = renderSelection(selection({ degraded: ['Availability unknown (timeout)'] })).split('\n');

    expect(lines).toContain('  Runner    : mac-docker (tag: mac-docker)');
    expect(lines).toContain('  Confidence: 50.0%');
    expect(lines).toContain('  Online    : mac-docker');
    expect(lines).toContain('  Bandit    : ucb1, mean 0.0000 over 0 pulls');
    expect(lines).toContain('  Took      : 0.2ms');
    expect(lines).toContain('  Job requires: docker');
    expect(lines.slice(-2)).toEqual(['Degraded:', '  • Availability unknown (timeout)']);
  });

  it('should render the bandit figures of an exploited arm', () => {
    const exploited = selection({ meanReward: 1 / 0.6, value: 2.99, pulls: 3 });

    expect(formatBandit(exploited.explanation)).toBe('ucb1, mean 1.6667 over 3 pulls, value 2.9900');
    expect(formatBandit(selection({ algorithm: null, meanReward: null, pulls: null }).explanation)).toBe('not consulted');
  });

  it('should render unknown availability', () => {
    const lines = renderSelection(selection({ onlineRunners: null })).split('\n');

    expect(lines).toContain('  Online    : unknown');
  });

  it('should build one row per pipeline job', () => {
    const none: SelectionResponse = {
      runnerKey: null,
      explanation: { ...selection().explanation, jobName: 'deploy', selectedRunner: null, recommendedTag: null, confidence: 0 },
    };

    expect(pipelineRows([selection(), none])).toEqual([
      ['build', 'mac-docker', 'mac-docker', '50.0%', '-'],
      ['deploy', 'none', '-', '0.0%', '-'],
    ]);
  });
});

describe('report', () => {
  it('should parse a complete outcome', () => {
    expect(parseReportOptions('mac-docker', { success: true, duration: '92.5', cost: '0', decision: 'decision-1' })).toEqual({
      runnerKey: 'mac-docker',
      success: true,
      durationSeconds: 92.5,
      costPerMinute: 0,
      decisionId: 'decision-1',
    });
  });

  it('should leave missing fields for the prompt', () => {
    expect(parseReportOptions('mac-docker', { failure: true })).toEqual({ runnerKey: 'mac-docker', success: false });
  });

  it('should reject conflicting flags', () => {
    expect(() => parseReportOptions('mac-docker', { success: true, failure: true })).toThrow(
      'Use either --success or --failure, not both'
    );
  });

  it('should reject negative durations', () => {
    expect(() => parseReportOptions('mac-docker', { duration: '-5' })).toThrow(
      '--duration must be a non-negative number, got "-5"'
    );
  });
});

describe('stats', () => {
  it('should list runners in ranking order', () => {
    const stats: StatsReport = {
      algorithm: 'ucb1',
      totalObservations: 3,
      runners: {
        'linux-docker': { pulls: 0, meanReward: 0, successRate: 0, avgDuration: 0 },
        'mac-docker': { pulls: 3, meanReward: 0.5, successRate: 2 / 3, avgDuration: 125 },
      },
      ranking: ['mac-docker', 'linux-docker'],
    };

    expect(statsRows(stats)).toEqual([
      ['1', 'mac-docker', '3', '0.5000', '66.7%', '2m 5s'],
      ['2', 'linux-docker', '0', '0.0000', '-', '-'],
    ]);
  });
});

describe('fleet', () => {
  it('should build a registration', () => {
    expect(
      buildRegistration({
        capabilities: 'docker, macos',
        tags: 'mac',
        cost: '0.02',
        executor: 'vm',
        externalId: '1001',
        ciTag: 'mac-docker',
      })
    ).toEqual({
      capabilities: ['docker', 'macos'],
      tags: ['mac'],
      costPerMinute: 0.02,
      executorClass: 'vm',
      externalId: 1001,
      ciTag: 'mac-docker',
    });
  });

  it('should reject unknown executor classes', () => {
    expect(() => buildRegistration({ capabilities: 'docker', executor: 'lambda' })).toThrow(
      '--executor must be one of: container, vm, orchestrator, shell'
    );
  });
});

describe('availability', () => {
  it('should explain unknown availability', () => {
    expect(renderProbe({ kind: 'unknown', reason: 'No GitLab API token configured', checkedAt: '2024-05-01T12:00:00.000Z' })).toBe(
      'Availability unknown: No GitLab API token configured'
    );
  });

  it('should list online runners', () => {
    expect(renderProbe({ kind: 'known', online: ['R1', 'R2'], checkedAt: '2024-05-01T12:00:00.000Z' })).toBe(
      '2 runner(s) online:\n  • R1\n  • R2'
    );
  });
});

describe('CLI', () => {
  let dir: string;
  let logs: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gantryctl-cli-'));
    logs = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    delete process.env.GANTRY_API_URL;
    delete process.env.GANTRY_API_TOKEN;
  });

  it('should store configuration values', async () => {
    const configPath = join(dir, 'config.json');

    await createCLI().parseAsync(['node', 'gantryctl', '--config', configPath, 'config', 'set', 'apiUrl', 'http://dispatcher:3000']);

    expect(JSON.parse(readFileSync(configPath, 'utf-8'))).toEqual({ apiUrl: 'http://dispatcher:3000' });
    expect(logs).toEqual(['✓ Set apiUrl = http://dispatcher:3000']);
  });

  it('should print only the runner key in quiet mode', async () => {
    const configPath = join(dir, 'config.json');
    const fetchMock = vi.fn(async (_url: string, _init?: unknown) =>
      new Response(JSON.stringify(selection()), { status: 200, headers: { 'Content-Type': 'application/json' } })
    );
    vi.stubGlobal('fetch', fetchMock);

    await createCLI().parseAsync([
      'node', 'gantryctl', '--config', configPath, '--quiet', 'select', '--tags', 'docker',
    ]);

    expect(logs).toEqual(['mac-docker']);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:3000/api/select');
  });
});
