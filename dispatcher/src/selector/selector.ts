/**
 * Decision façade
 *
 * parse → solve → probe → select, strictly in that order. Misuse
 * (unknown runner, unreadable job) throws; environmental failures are
 * absorbed into `explanation.degraded` so a caller always gets a
 * best-effort answer.
 */

import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';
import type {
  FeasibilityResult,
  JobDeclaration,
  JobRequirement,
  OutcomeReport,
  ProbeResult,
  SelectionExplanation,
  SelectionResponse,
  StatsReport,
} from '@gantry/shared';
import { silentLogger, type Logger } from '@gantry/shared';
import { errorMessage } from '../errors.js';
import type { CapabilityOntology } from '../ontology/index.js';
import type { RequirementParser } from '../parser/index.js';
import type { ConstraintSolver } from '../solver/index.js';
import type { BanditEngine, UpdateResult } from '../bandit/index.js';
import type { AvailabilityProber } from '../availability/index.js';
import type { LifecycleController } from '../lifecycle/index.js';

export interface RunnerSelectorDeps {
  ontology: CapabilityOntology;
  parser: RequirementParser;
  solver: ConstraintSolver;
  bandit: BanditEngine;
  prober: AvailabilityProber;
  lifecycle: LifecycleController;
  logger?: Logger;
}

/**
 * Outcome report, optionally tied to the decision it follows
 */
export interface OutcomeSubmission extends OutcomeReport {
  decisionId?: string;
  timestamp?: string;
}

interface Decision {
  runnerKey: string | null;
  confidence: number;
  statisticalReasoning: string;
  capacityRequested: boolean;
  onlineRunners: string[] | null;
  bandit: BanditFigures;
}

type BanditFigures = Pick<SelectionExplanation, 'algorithm' | 'meanReward' | 'value' | 'pulls'>;

const NO_BANDIT: BanditFigures = { algorithm: null, meanReward: null, value: null, pulls: null };

/**
 * Events:
 * - 'decision' (SelectionResponse)
 * - 'outcome' (UpdateResult, decisionId?)
 */
export class RunnerSelector extends EventEmitter {
  private ontology: CapabilityOntology;
  private parser: RequirementParser;
  private solver: ConstraintSolver;
  private bandit: BanditEngine;
  private prober: AvailabilityProber;
  private lifecycle: LifecycleController;
  private logger: Logger;

  constructor(deps: RunnerSelectorDeps) {
    super();
    this.ontology = deps.ontology;
    this.parser = deps.parser;
    this.solver = deps.solver;
    this.bandit = deps.bandit;
    this.prober = deps.prober;
    this.lifecycle = deps.lifecycle;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Pick a runner for one job
   *
   * `runnerKey` is null only when no registered runner can run the job.
   */
  async selectRunner(job: JobDeclaration, jobName?: string): Promise<SelectionResponse> {
    const startedAt = performance.now();
    return this.decideFor(this.parser.parse(job, jobName), startedAt);
  }

  /**
   * Pick a runner for every job of a CI file, one after another
   */
  async selectPipeline(yamlContent: string): Promise<SelectionResponse[]> {
    const responses: SelectionResponse[] = [];
    for (const requirement of this.parser.parsePipeline(yamlContent)) {
      responses.push(await this.selectForRequirement(requirement));
    }
    return responses;
  }

  async selectForRequirement(requirement: JobRequirement): Promise<SelectionResponse> {
    return this.decideFor(requirement, performance.now());
  }

  private async decideFor(requirement: JobRequirement, startedAt: number): Promise<SelectionResponse> {
    const feasibility = this.solver.solve(requirement, this.ontology.profiles());
    const feasible = feasibility.ranked.map(r => r.runnerKey);
    const degraded: string[] = [];

    let decision: Decision;
    if (feasible.length === 0) {
      decision = {
        runnerKey: null,
        confidence: 0,
        statisticalReasoning: 'No feasible runner, bandit not consulted',
        capacityRequested: false,
        onlineRunners: null,
        bandit: NO_BANDIT,
      };
    } else {
      decision = await this.decide(feasibility, feasible, degraded);
    }
    const elapsedMs = performance.now() - startedAt;

    this.lifecycle.armIdleShutdown();

    const response = this.buildResponse(requirement, feasibility, feasible, decision, degraded, elapsedMs);
    this.logger.info(
      `Decision ${response.explanation.decisionId}: ${requirement.jobName || '(unnamed job)'} -> ${response.runnerKey ?? 'none'}`
    );
    this.emit('decision', response);
    return response;
  }

  /**
   * Record how a job went on the runner it was sent to
   *
   * The runner's registered cost is used when the report has none.
   *
   * @throws UnknownRunnerError when the runner is not registered
   */
  async reportOutcome(report: OutcomeSubmission): Promise<UpdateResult> {
    const profile = this.ontology.findProfile(report.runnerKey);

    const result = await this.bandit.update({
      runnerKey: report.runnerKey,
      success: report.success,
      durationSeconds: report.durationSeconds,
      costPerMinute: report.costPerMinute ?? profile?.costPerMinute ?? 0,
      timestamp: report.timestamp,
    });

    this.lifecycle.armIdleShutdown();

    const decision = report.decisionId ? ` (decision ${report.decisionId})` : '';
    this.logger.info(
      `Outcome for ${report.runnerKey}${decision}: ${report.success ? 'success' : 'failure'} in ${report.durationSeconds}s, reward ${result.reward.toFixed(4)}`
    );
    this.emit('outcome', result, report.decisionId);
    return result;
  }

  async getStats(): Promise<StatsReport> {
    return this.bandit.getStats();
  }

  async reset(): Promise<boolean> {
    return this.bandit.reset();
  }

  async probe(): Promise<ProbeResult> {
    try {
      return await this.prober.onlineRunnerKeys();
    } catch (error) {
      return { kind: 'unknown', reason: errorMessage(error), checkedAt: new Date().toISOString() };
    }
  }

  private async decide(
    feasibility: FeasibilityResult,
    feasible: string[],
    degraded: string[],
  ): Promise<Decision> {
    const probe = await this.probe();

    let candidates = feasible;
    let onlineRunners: string[] | null = null;
    if (probe.kind === 'unknown') {
      const note = `Availability unknown (${probe.reason}), assuming all feasible runners are available`;
      this.logger.warn(note);
      degraded.push(note);
    } else {
      const online = new Set(probe.online);
      onlineRunners = feasible.filter(key => online.has(key));
      candidates = onlineRunners;
    }

    if (candidates.length === 0) {
      return this.requestCapacity(feasibility, degraded);
    }

    const selection = await this.bandit.select(candidates);
    if (selection === null) {
      return this.requestCapacity(feasibility, degraded);
    }
    degraded.push(...selection.degraded);

    return {
      runnerKey: selection.runnerKey,
      confidence: selection.confidence,
      statisticalReasoning: selection.reasoning,
      capacityRequested: false,
      onlineRunners,
      bandit: {
        algorithm: selection.algorithm,
        meanReward: selection.meanReward,
        value: selection.value,
        pulls: selection.pulls,
      },
    };
  }

  /**
   * No feasible runner is online: start capacity and fall back to the
   * solver's best runner, which the job can wait for
   */
  private async requestCapacity(feasibility: FeasibilityResult, degraded: string[]): Promise<Decision> {
    const top = feasibility.ranked[0]?.runnerKey ?? null;
    const capacity = await this.lifecycle.ensureCapacity();

    if (capacity.action === 'failed') {
      degraded.push(capacity.message);
    } else if (capacity.action === 'not-configured') {
      degraded.push('No feasible runner is online and no compute mechanism is configured');
    }

    return {
      runnerKey: top,
      confidence: 0,
      statisticalReasoning: `No feasible runner is online; capacity ${capacity.action} (${capacity.message}). Falling back to top-ranked ${top ?? 'none'}`,
      capacityRequested: true,
      onlineRunners: [],
      bandit: NO_BANDIT,
    };
  }

  private buildResponse(
    requirement: JobRequirement,
    feasibility: FeasibilityResult,
    feasible: string[],
    decision: Decision,
    degraded: string[],
    elapsedMs: number,
  ): SelectionResponse {
    const profile = decision.runnerKey !== null ? this.ontology.findProfile(decision.runnerKey) : undefined;

    const explanation: SelectionExplanation = {
      decisionId: uuidv4(),
      jobName: requirement.jobName,
      feasibleRunners: feasible,
      onlineRunners: decision.onlineRunners,
      selectedRunner: decision.runnerKey,
      recommendedTag: profile?.ciTag ?? null,
      confidence: decision.confidence,
      symbolicReasoning: feasibility.summary,
      statisticalReasoning: decision.statisticalReasoning,
      ...decision.bandit,
      degraded,
      capacityRequested: decision.capacityRequested,
      solveTimeMs: elapsedMs,
      decidedAt: new Date().toISOString(),
    };

    return { runnerKey: decision.runnerKey, explanation };
  }
}
