/**
 * Shared test fixtures
 */

import { vi } from 'vitest';
import type { JobRequirement } from '@gantry/shared';
import type { Logger } from '@gantry/shared';

export interface RecordingLogger extends Logger {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

/**
 * Logger whose calls can be asserted on
 */
export function createRecordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

/**
 * Deterministic uniform source (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Source that replays the given values in a loop
 */
export function sequence(...values: number[]): () => number {
  let i = 0;
  return () => {
    const value = values[i % values.length] ?? 0;
    i++;
    return value;
  };
}

export function requirement(required: string[], preferred: string[] = []): JobRequirement {
  return { jobName: 'job', required, preferred, ignoredTags: [], resourceHints: {} };
}
