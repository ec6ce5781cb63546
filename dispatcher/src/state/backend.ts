import { z } from 'zod';
import type { ArmStatistics, BanditState } from '@gantry/shared';
import { StatePersistenceError } from '../errors.js';

/**
 * Durable store for bandit statistics
 *
 * Backends throw StatePersistenceError; the bandit engine decides how
 * to degrade.
 */
export interface StateBackend {
  /** Human-readable location, for logs */
  readonly description: string;

  load(): Promise<BanditState>;

  save(state: BanditState): Promise<void>;
}

/**
 * Persisted arm. Fields added after `pulls` and `totalReward` default to 0.
 */
const armSchema = z.object({
  pulls: z.number().int().nonnegative(),
  totalReward: z.number(),
  successes: z.number().int().nonnegative().default(0),
  failures: z.number().int().nonnegative().default(0),
  totalDuration: z.number().nonnegative().default(0),
});

const stateSchema = z.record(armSchema);

/**
 * Validate a decoded state document, default-filling missing fields
 *
 * @throws StatePersistenceError when the document has the wrong shape
 */
export function parseState(raw: unknown): BanditState {
  const result = stateSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new StatePersistenceError(`Malformed bandit state${where}: ${issue?.message ?? 'invalid document'}`);
  }
  return result.data;
}

export function emptyArm(): ArmStatistics {
  return { pulls: 0, totalReward: 0, successes: 0, failures: 0, totalDuration: 0 };
}

export function cloneState(state: BanditState): BanditState {
  const copy: BanditState = {};
  for (const [key, arm] of Object.entries(state)) {
    copy[key] = { ...arm };
  }
  return copy;
}
