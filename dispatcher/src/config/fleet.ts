import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ComputeConfig, RunnerRegistration } from '@gantry/shared';
import { FleetConfigError, errorMessage } from '../errors.js';
import { formatIssues } from '../parser/index.js';
import { isReservedRunnerKey } from '../ontology/index.js';

/**
 * Contents of the fleet definition file
 */
export interface FleetDefinition {
  runners: RunnerRegistration[];

  /** Extra capability implications, added to the defaults */
  implications: Record<string, string[]>;

  /** Extra tag mappings, added to the defaults */
  tagMappings: Record<string, string[]>;

  /** Compute-control mechanism for on-demand capacity */
  compute?: ComputeConfig;
}

const commandInvocationSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  workingDirectory: z.string().optional(),
});

const webhookCallSchema = z.object({
  url: z.string().url(),
  method: z.enum(['POST', 'PUT']).optional(),
  headers: z.record(z.string()).optional(),
  bodyTemplate: z.string().optional(),
});

const timeoutSchema = z.number().int().positive().optional();

const computeSchema: z.ZodType<ComputeConfig> = z.discriminatedUnion('mechanism', [
  z.object({ mechanism: z.literal('none') }),
  z.object({
    mechanism: z.literal('command'),
    command: z.object({
      start: commandInvocationSchema,
      stop: commandInvocationSchema,
      timeoutMs: timeoutSchema,
    }),
  }),
  z.object({
    mechanism: z.literal('webhook'),
    webhook: z.object({
      instance: z.string().optional(),
      start: webhookCallSchema,
      stop: webhookCallSchema,
      successCodes: z.array(z.number().int()).optional(),
      timeoutMs: timeoutSchema,
    }),
  }),
  z.object({
    mechanism: z.literal('kubernetes'),
    kubernetes: z.object({
      namespace: z.string().min(1),
      deployment: z.string().min(1),
      replicas: z.number().int().positive().optional(),
      context: z.string().optional(),
      timeoutMs: timeoutSchema,
    }),
  }),
]);

/**
 * One runner entry, as in the fleet file and the fleet API
 */
export const runnerRegistrationSchema = z.object({
  runnerKey: z.string().trim().min(1).refine(key => !isReservedRunnerKey(key), { message: 'runnerKey is reserved' }),
  displayName: z.string().optional(),
  tags: z.array(z.string()).optional(),
  capabilities: z.array(z.string()),
  costPerMinute: z.number().nonnegative().optional(),
  executorClass: z.enum(['container', 'vm', 'orchestrator', 'shell']).optional(),
  externalId: z.number().int().positive().optional(),
  ciTag: z.string().optional(),
});

const fleetSchema = z.object({
  runners: z.array(runnerRegistrationSchema).default([]),
  implications: z.record(z.array(z.string())).default({}),
  tagMappings: z.record(z.array(z.string())).default({}),
  compute: computeSchema.optional(),
});

/**
 * Validate a decoded fleet document
 *
 * @throws FleetConfigError listing every problem
 */
export function parseFleet(raw: unknown, source = 'fleet definition'): FleetDefinition {
  const result = fleetSchema.safeParse(raw);
  if (!result.success) {
    throw new FleetConfigError(`Invalid ${source}`, formatIssues(result.error));
  }

  const seen = new Set<string>();
  for (const runner of result.data.runners) {
    if (seen.has(runner.runnerKey)) {
      throw new FleetConfigError(`Invalid ${source}`, [`runners: duplicate runnerKey '${runner.runnerKey}'`]);
    }
    seen.add(runner.runnerKey);
  }

  return result.data;
}

/**
 * Read and validate the fleet file
 *
 * @throws FleetConfigError when the file is missing, not JSON or invalid
 */
export async function loadFleetFile(filePath: string): Promise<FleetDefinition> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FleetConfigError(`Cannot read fleet file ${filePath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new FleetConfigError(`Fleet file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseFleet(raw, `fleet file ${filePath}`);
}
