/**
 * Capability ontology
 *
 * Holds the registered runners and the implication rules between
 * capabilities. Every stored profile carries its closed capability set.
 */

import type { CapabilityKind, RunnerProfile, RunnerRegistration } from '@gantry/shared';
import { InvalidRunnerKeyError, NotFoundError } from '../errors.js';
import { DEFAULT_IMPLICATIONS, capabilityKind, normalizeCapability } from './taxonomy.js';

/** Keys that statistics and snapshots cannot hold as own properties */
export const RESERVED_RUNNER_KEYS: readonly string[] = ['__proto__', 'constructor', 'prototype'];

export function isReservedRunnerKey(runnerKey: string): boolean {
  return RESERVED_RUNNER_KEYS.includes(runnerKey);
}

/**
 * Read-only view of which runner keys exist
 */
export interface RunnerDirectory {
  has(runnerKey: string): boolean;
  keys(): string[];
}

export interface OntologyConfig {
  /** Extra implication rules, merged over the defaults */
  implications?: Record<string, string[]>;

  /** Start from the default implication rules (default: true) */
  includeDefaults?: boolean;
}

/**
 * Serializable snapshot of the ontology
 */
export interface OntologySnapshot {
  implications: Record<string, string[]>;
  capabilities: Record<string, { kind: CapabilityKind; runners: string[] }>;
  runners: RunnerProfile[];
}

/**
 * Close a capability set under the implication rules
 *
 * Repeats full passes until one adds nothing, so cyclic rules terminate.
 */
export function closeCapabilities(
  declared: Iterable<string>,
  implications: ReadonlyMap<string, ReadonlySet<string>>,
): Set<string> {
  const closed = new Set(declared);

  let changed = true;
  while (changed) {
    changed = false;
    for (const capability of Array.from(closed)) {
      const implied = implications.get(capability);
      if (!implied) continue;
      for (const target of implied) {
        if (!closed.has(target)) {
          closed.add(target);
          changed = true;
        }
      }
    }
  }

  return closed;
}

export class CapabilityOntology implements RunnerDirectory {
  private rules = new Map<string, Set<string>>();
  private runners = new Map<string, RunnerProfile>();

  constructor(config: OntologyConfig = {}) {
    if (config.includeDefaults ?? true) {
      for (const [from, targets] of Object.entries(DEFAULT_IMPLICATIONS)) {
        this.addRule(from, targets);
      }
    }
    for (const [from, targets] of Object.entries(config.implications ?? {})) {
      this.addRule(from, targets);
    }
  }

  /**
   * Register a runner, or replace the declared set of a known one
   *
   * Other runners are not touched.
   *
   * @throws InvalidRunnerKeyError for a reserved key
   */
  register(registration: RunnerRegistration): RunnerProfile {
    const runnerKey = registration.runnerKey.trim();
    if (isReservedRunnerKey(runnerKey)) {
      throw new InvalidRunnerKeyError(runnerKey);
    }
    const declared = uniqueSorted(registration.capabilities.map(normalizeCapability));
    const existing = this.runners.get(runnerKey);
    const now = new Date().toISOString();

    const profile: RunnerProfile = {
      runnerKey,
      displayName: registration.displayName ?? existing?.displayName ?? runnerKey,
      declaredTags: registration.tags ?? existing?.declaredTags ?? [],
      declaredCapabilities: declared,
      capabilities: Array.from(closeCapabilities(declared, this.rules)).sort(),
      costPerMinute: registration.costPerMinute ?? existing?.costPerMinute ?? 0,
      executorClass: registration.executorClass ?? existing?.executorClass ?? 'container',
      registeredAt: existing?.registeredAt ?? now,
      updatedAt: now,
    };

    const externalId = registration.externalId ?? existing?.externalId;
    if (externalId !== undefined) {
      profile.externalId = externalId;
    }
    const ciTag = registration.ciTag ?? existing?.ciTag;
    if (ciTag !== undefined) {
      profile.ciTag = ciTag;
    }

    this.runners.set(runnerKey, profile);
    return profile;
  }

  /**
   * Closed capability set of a runner
   *
   * @throws NotFoundError when the runner is not registered
   */
  capabilitiesOf(runnerKey: string): Set<string> {
    return new Set(this.getProfile(runnerKey).capabilities);
  }

  /**
   * Current implication rules
   */
  implications(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [from, targets] of this.rules) {
      result[from] = Array.from(targets).sort();
    }
    return result;
  }

  /**
   * Add an implication rule and recompute every closure
   *
   * Targets that name no known capability are inert.
   */
  addImplication(from: string, targets: string[]): void {
    this.addRule(from, targets);
    for (const profile of this.runners.values()) {
      profile.capabilities = Array.from(closeCapabilities(profile.declaredCapabilities, this.rules)).sort();
    }
  }

  /**
   * @throws NotFoundError when the runner is not registered
   */
  getProfile(runnerKey: string): RunnerProfile {
    const profile = this.runners.get(runnerKey);
    if (!profile) {
      throw new NotFoundError(runnerKey);
    }
    return profile;
  }

  findProfile(runnerKey: string): RunnerProfile | undefined {
    return this.runners.get(runnerKey);
  }

  /**
   * All profiles, ordered by runner key
   */
  profiles(): RunnerProfile[] {
    return this.keys().map(key => this.getProfile(key));
  }

  has(runnerKey: string): boolean {
    return this.runners.has(runnerKey);
  }

  keys(): string[] {
    return Array.from(this.runners.keys()).sort();
  }

  get size(): number {
    return this.runners.size;
  }

  runnersWithCapability(capability: string): string[] {
    const wanted = normalizeCapability(capability);
    return this.profiles()
      .filter(p => p.capabilities.includes(wanted))
      .map(p => p.runnerKey);
  }

  runnersWithAllCapabilities(capabilities: string[]): string[] {
    const wanted = capabilities.map(normalizeCapability);
    return this.profiles()
      .filter(p => wanted.every(c => p.capabilities.includes(c)))
      .map(p => p.runnerKey);
  }

  kindOf(capability: string): CapabilityKind {
    return capabilityKind(normalizeCapability(capability));
  }

  describe(): OntologySnapshot {
    const capabilities: OntologySnapshot['capabilities'] = {};
    for (const profile of this.profiles()) {
      for (const capability of profile.capabilities) {
        const entry = capabilities[capability] ?? { kind: capabilityKind(capability), runners: [] };
        entry.runners.push(profile.runnerKey);
        capabilities[capability] = entry;
      }
    }

    return {
      implications: this.implications(),
      capabilities,
      runners: this.profiles(),
    };
  }

  private addRule(from: string, targets: readonly string[]): void {
    const key = normalizeCapability(from);
    const existing = this.rules.get(key) ?? new Set<string>();
    for (const target of targets) {
      existing.add(normalizeCapability(target));
    }
    this.rules.set(key, existing);
  }
}

function uniqueSorted(values: string[]): string[] {
  return Array.from(new Set(values.filter(v => v.length > 0))).sort();
}
