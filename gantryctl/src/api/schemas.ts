/**
 * Response shapes of the dispatcher REST API
 *
 * Tied to the shared types so a change on the server side shows up here
 * at compile time.
 */

import { z } from 'zod';
import type {
  CapacityActionResult,
  LifecycleState,
  ProbeResult,
  RunnerProfile,
  RunnerStatsSnapshot,
  SelectionExplanation,
  SelectionResponse,
  StatsReport,
} from '@gantry/shared';

export const healthSchema = z.object({
  status: z.string(),
  runners: z.number().optional(),
  stateBackend: z.string().optional(),
  availability: z.string().optional(),
});

const explanationSchema: z.ZodType<SelectionExplanation> = z.object({
  decisionId: z.string(),
  jobName: z.string(),
  feasibleRunners: z.array(z.string()),
  onlineRunners: z.array(z.string()).nullable(),
  selectedRunner: z.string().nullable(),
  recommendedTag: z.string().nullable(),
  confidence: z.number(),
  symbolicReasoning: z.string(),
  statisticalReasoning: z.string(),
  algorithm: z.enum(['ucb1', 'thompson', 'epsilon-greedy']).nullable(),
  meanReward: z.number().nullable(),
  value: z.number().nullable(),
  pulls: z.number().nullable(),
  degraded: z.array(z.string()),
  capacityRequested: z.boolean(),
  solveTimeMs: z.number(),
  decidedAt: z.string(),
});

export const selectionSchema: z.ZodType<SelectionResponse> = z.object({
  runnerKey: z.string().nullable(),
  explanation: explanationSchema,
});

export const pipelineSelectionSchema = z.object({
  decisions: z.array(selectionSchema),
  count: z.number(),
});

export const outcomeResultSchema = z.object({
  recorded: z.boolean(),
  runnerKey: z.string(),
  reward: z.number(),
  persisted: z.boolean(),
  degraded: z.array(z.string()),
});

const runnerStatsSchema: z.ZodType<RunnerStatsSnapshot> = z.object({
  pulls: z.number(),
  meanReward: z.number(),
  successRate: z.number(),
  avgDuration: z.number(),
});

export const statsSchema: z.ZodType<StatsReport> = z.object({
  algorithm: z.enum(['ucb1', 'thompson', 'epsilon-greedy']),
  totalObservations: z.number(),
  runners: z.record(runnerStatsSchema),
  ranking: z.array(z.string()),
});

export const resetSchema = z.object({ reset: z.boolean() });

export const profileSchema: z.ZodType<RunnerProfile> = z.object({
  runnerKey: z.string(),
  displayName: z.string(),
  declaredTags: z.array(z.string()),
  declaredCapabilities: z.array(z.string()),
  capabilities: z.array(z.string()),
  costPerMinute: z.number(),
  executorClass: z.enum(['container', 'vm', 'orchestrator', 'shell']),
  externalId: z.number().optional(),
  ciTag: z.string().optional(),
  registeredAt: z.string(),
  updatedAt: z.string(),
});

export const fleetSchema = z.object({
  runners: z.array(profileSchema),
  count: z.number(),
  implications: z.record(z.array(z.string())),
});

export const probeSchema: z.ZodType<ProbeResult> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('known'), online: z.array(z.string()), checkedAt: z.string() }),
  z.object({ kind: z.literal('unknown'), reason: z.string(), checkedAt: z.string() }),
]);

const lifecycleStateSchema: z.ZodType<LifecycleState> = z.object({
  autoStarted: z.boolean(),
  startedAt: z.string().nullable(),
  shutdownDeadline: z.string().nullable(),
  phase: z.enum(['idle', 'starting', 'running', 'stopping']),
});

export const lifecycleSchema = z.object({
  configured: z.boolean(),
  idleShutdownMs: z.number(),
  state: lifecycleStateSchema,
});

export const capacityResultSchema: z.ZodType<CapacityActionResult> = z.object({
  action: z.enum(['started', 'already-started', 'stopped', 'not-configured', 'skipped', 'failed']),
  message: z.string(),
  state: lifecycleStateSchema,
});

export const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

export type HealthResponse = z.infer<typeof healthSchema>;
export type PipelineSelection = z.infer<typeof pipelineSelectionSchema>;
export type OutcomeResult = z.infer<typeof outcomeResultSchema>;
export type FleetListing = z.infer<typeof fleetSchema>;
export type LifecycleStatus = z.infer<typeof lifecycleSchema>;
