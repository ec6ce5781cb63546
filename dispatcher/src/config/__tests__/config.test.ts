/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_DISPATCHER_CONFIG } from '@gantry/shared';
import { loadConfig } from '../env.js';
import { parseFleet, loadFleetFile } from '../fleet.js';
import { ConfigurationError, FleetConfigError } from '../../errors.js';

describe('loadConfig', () => {
  it('should return the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_DISPATCHER_CONFIG);
  });

  it('should not share objects with the defaults', () => {
    const config = loadConfig({});
    config.bandit.epsilon = 0.9;

    expect(DEFAULT_DISPATCHER_CONFIG.bandit.epsilon).toBe(0.1);
  });

  it('should apply environment overrides', () => {
    const config = loadConfig({
      GANTRY_PROJECT_ID: 'ci-main',
      NATS_URL: 'nats://nats.internal:4222',
      NATS_ENABLED: 'true',
      API_PORT: '8080',
      API_TOKENS: 'test-secret, other-secret ,',
      BANDIT_ALGORITHM: 'Thompson',
      BANDIT_UCB_C: '1.5',
      BANDIT_EPSILON: '0.2',
      STATE_BACKEND: 'nats-kv',
      STATE_BUCKET: 'runner-stats',
      AVAILABILITY_PROVIDER: 'none',
      GITLAB_API_TOKEN: 'test-secret',
      LIFECYCLE_ENABLED: 'false',
      IDLE_SHUTDOWN_MS: '600000',
      GITLAB_WEBHOOK_SECRET: 'test-secret',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.projectId).toBe('ci-main');
    expect(config.nats).toMatchObject({ url: 'nats://nats.internal:4222', enabled: true });
    expect(config.api.port).toBe(8080);
    expect(config.api.authTokens).toEqual(['test-secret', 'other-secret']);
    expect(config.bandit).toEqual({
      algorithm: 'thompson',
      explorationConstant: 1.5,
      epsilon: 0.2,
      priorAlpha: 1,
      priorBeta: 1,
    });
    expect(config.state).toMatchObject({ backend: 'nats-kv', bucket: 'runner-stats', key: 'arms' });
    expect(config.availability).toMatchObject({ provider: 'none', token: 'test-secret' });
    expect(config.lifecycle).toMatchObject({ enabled: false, idleShutdownMs: 600000 });
    expect(config.webhookSecret).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject values it cannot use', () => {
    expect(() => loadConfig({ BANDIT_ALGORITHM: 'softmax' })).toThrow(
      'BANDIT_ALGORITHM must be one of ucb1, thompson, epsilon-greedy, got softmax'
    );
    expect(() => loadConfig({ API_PORT: 'http' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ BANDIT_EPSILON: '1.5' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ NATS_ENABLED: 'sometimes' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'trace' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'constructor' })).toThrow(ConfigurationError);
  });
});

describe('parseFleet', () => {
  it('should default the optional sections', () => {
    expect(parseFleet({ runners: [{ runnerKey: 'r1', capabilities: ['docker'] }] })).toEqual({
      runners: [{ runnerKey: 'r1', capabilities: ['docker'] }],
      implications: {},
      tagMappings: {},
    });
  });

  it('should accept each compute mechanism', () => {
    const fleet = parseFleet({
      compute: { mechanism: 'kubernetes', kubernetes: { namespace: 'ci', deployment: 'runner', replicas: 2 } },
    });

    expect(fleet.compute).toEqual({
      mechanism: 'kubernetes',
      kubernetes: { namespace: 'ci', deployment: 'runner', replicas: 2 },
    });
  });

  it('should list every problem', () => {
    try {
      parseFleet({
        runners: [{ runnerKey: '', capabilities: 'docker' }],
        compute: { mechanism: 'ssh' },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FleetConfigError);
      if (!(error instanceof FleetConfigError)) return;
      expect(error.message).toBe('Invalid fleet definition');
      expect(error.issues.some(issue => issue.startsWith('runners.0.runnerKey:'))).toBe(true);
      expect(error.issues.some(issue => issue.startsWith('runners.0.capabilities:'))).toBe(true);
      expect(error.issues.some(issue => issue.startsWith('compute.mechanism:'))).toBe(true);
    }
  });

  it('should reject reserved runner keys', () => {
    try {
      parseFleet(JSON.parse('{"runners":[{"runnerKey":"__proto__","capabilities":["docker"]},{"runnerKey":"constructor","capabilities":[]}]}'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FleetConfigError);
      if (!(error instanceof FleetConfigError)) return;
      expect(error.issues).toEqual([
        'runners.0.runnerKey: runnerKey is reserved',
        'runners.1.runnerKey: runnerKey is reserved',
      ]);
    }
  });

  it('should reject duplicate runner keys', () => {
    expect(() => parseFleet({
      runners: [
        { runnerKey: 'r1', capabilities: [] },
        { runnerKey: 'r1', capabilities: ['docker'] },
      ],
    })).toThrow(FleetConfigError);
  });
});

describe('loadFleetFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-fleet-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a fleet file', async () => {
    const filePath = join(dir, 'fleet.json');
    await writeFile(filePath, JSON.stringify({ runners: [{ runnerKey: 'r1', capabilities: ['gpu'], costPerMinute: 0.5 }] }));

    const fleet = await loadFleetFile(filePath);

    expect(fleet.runners).toEqual([{ runnerKey: 'r1', capabilities: ['gpu'], costPerMinute: 0.5 }]);
  });

  it('should fail on a missing file', async () => {
    await expect(loadFleetFile(join(dir, 'missing.json'))).rejects.toBeInstanceOf(FleetConfigError);
  });

  it('should fail on invalid JSON', async () => {
    const filePath = join(dir, 'fleet.json');
    await writeFile(filePath, '{ runners: [] }');

    await expect(loadFleetFile(filePath)).rejects.toThrow(`Fleet file ${filePath} is not valid JSON`);
  });

  it('should accept the shipped example', async () => {
    const fleet = await loadFleetFile(fileURLToPath(new URL('../../../../config/fleet.json', import.meta.url)));

    expect(fleet.runners.map(r => r.runnerKey)).toEqual(['mac-docker', 'linux-docker', 'mac-k8s', 'nordic']);
    expect(fleet.compute?.mechanism).toBe('command');
  });
});
