/**
 * Component wiring
 *
 * Builds the ontology, parser, solver, bandit, prober and lifecycle
 * controller from configuration and a fleet definition, and composes
 * them behind a RunnerSelector. Used by the service and by embedders.
 */

import type { JetStreamClient } from 'nats';
import type { DispatcherConfiguration } from '@gantry/shared';
import { silentLogger, type Logger } from '@gantry/shared';
import type { FleetDefinition } from './config/index.js';
import { CapabilityOntology } from './ontology/index.js';
import { RequirementParser } from './parser/index.js';
import { ConstraintSolver } from './solver/index.js';
import { BanditEngine } from './bandit/index.js';
import { createStateBackend, type StateBackend } from './state/index.js';
import { createAvailabilityProber, type AvailabilityProber } from './availability/index.js';
import { LifecycleController, type ComputeRunner } from './lifecycle/index.js';
import { RunnerSelector } from './selector/index.js';

export interface Dispatcher {
  config: DispatcherConfiguration;
  ontology: CapabilityOntology;
  parser: RequirementParser;
  solver: ConstraintSolver;
  backend: StateBackend;
  bandit: BanditEngine;
  prober: AvailabilityProber;
  lifecycle: LifecycleController;
  selector: RunnerSelector;
}

/**
 * Replacements for the configured components (tests, embedding)
 */
export interface DispatcherOverrides {
  backend?: StateBackend;
  prober?: AvailabilityProber;
  computeRunner?: ComputeRunner;

  /** Uniform source for the bandit (default: Math.random) */
  random?: () => number;

  /** Needed for the nats-kv state backend */
  js?: JetStreamClient;

  logger?: Logger;
}

export async function createDispatcher(
  config: DispatcherConfiguration,
  fleet: FleetDefinition,
  overrides: DispatcherOverrides = {},
): Promise<Dispatcher> {
  const logger = overrides.logger ?? silentLogger;

  const ontology = new CapabilityOntology({ implications: fleet.implications });
  for (const runner of fleet.runners) {
    ontology.register(runner);
  }

  const parser = new RequirementParser({ tagMappings: fleet.tagMappings });
  const solver = new ConstraintSolver();

  const backend = overrides.backend ?? await createStateBackend(config.state, config.projectId, overrides.js);
  const bandit = new BanditEngine(ontology, backend, {
    algorithm: config.bandit.algorithm,
    explorationConstant: config.bandit.explorationConstant,
    epsilon: config.bandit.epsilon,
    priorAlpha: config.bandit.priorAlpha,
    priorBeta: config.bandit.priorBeta,
    random: overrides.random,
    logger: logger.child('bandit'),
  });

  const prober = overrides.prober ?? createAvailabilityProber(config.availability, ontology, logger.child('availability'));

  const lifecycle = new LifecycleController({
    enabled: config.lifecycle.enabled,
    idleShutdownMs: config.lifecycle.idleShutdownMs,
    checkIntervalMs: config.lifecycle.checkIntervalMs,
    compute: fleet.compute ?? config.lifecycle.compute,
    runner: overrides.computeRunner,
    logger: logger.child('lifecycle'),
  });

  const selector = new RunnerSelector({
    ontology,
    parser,
    solver,
    bandit,
    prober,
    lifecycle,
    logger: logger.child('selector'),
  });

  return { config, ontology, parser, solver, backend, bandit, prober, lifecycle, selector };
}
