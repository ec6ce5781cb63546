/**
 * Requirement parser
 *
 * Turns a free-form job declaration into required and preferred
 * capability sets. Pure: the same declaration always yields the same
 * requirement.
 */

import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import type { ImageReference, JobDeclaration, JobRequirement } from '@gantry/shared';
import { InvalidJobError, errorMessage } from '../errors.js';
import { normalizeCapability } from '../ontology/index.js';
import {
  DEFAULT_TAG_MAPPINGS,
  DEFAULT_TIMEOUT_SECONDS,
  IMAGE_PATTERNS,
  IMAGE_RUNTIME_CAPABILITY,
  RESERVED_PIPELINE_KEYS,
  SERVICE_PATTERNS,
} from './rules.js';
import { jobDeclarationSchema, pipelineDefaultsSchema } from './schema.js';

export interface RequirementParserConfig {
  /** Extra or overriding tag mappings */
  tagMappings?: Record<string, string[]>;
}

export class RequirementParser {
  private mappings = new Map<string, string[]>();

  constructor(config: RequirementParserConfig = {}) {
    for (const [tag, capabilities] of Object.entries(DEFAULT_TAG_MAPPINGS)) {
      this.addTagMapping(tag, [...capabilities]);
    }
    for (const [tag, capabilities] of Object.entries(config.tagMappings ?? {})) {
      this.addTagMapping(tag, capabilities);
    }
  }

  /**
   * Add or replace a tag mapping (tags are matched case-insensitively)
   */
  addTagMapping(tag: string, capabilities: string[]): void {
    this.mappings.set(normalizeCapability(tag), capabilities.map(normalizeCapability));
  }

  tagMappings(): Record<string, string[]> {
    return Object.fromEntries(this.mappings);
  }

  parse(job: JobDeclaration, jobName?: string): JobRequirement {
    const required: string[] = [];
    const preferred: string[] = [];
    const ignoredTags: string[] = [];

    for (const tag of toTagList(job.tags)) {
      const mapped = this.mappings.get(normalizeCapability(tag));
      if (mapped) {
        required.push(...mapped);
      } else {
        ignoredTags.push(tag);
      }
    }

    const image = imageName(job.image);
    if (image) {
      preferred.push(IMAGE_RUNTIME_CAPABILITY);
      for (const rule of IMAGE_PATTERNS) {
        if (rule.pattern.test(image)) {
          preferred.push(...rule.capabilities);
        }
      }
    }

    for (const service of job.services ?? []) {
      const name = imageName(service);
      for (const [fragment, capabilities] of Object.entries(SERVICE_PATTERNS)) {
        if (name.includes(fragment)) {
          preferred.push(...capabilities);
        }
      }
    }

    const requirement: JobRequirement = {
      jobName: jobName ?? job.name ?? '',
      required: unique(required),
      preferred: unique(preferred),
      ignoredTags,
      resourceHints: resourceHints(job.variables),
    };

    if (job.timeout !== undefined && job.timeout !== '') {
      requirement.timeoutSeconds = parseTimeout(job.timeout);
    }

    return requirement;
  }

  /**
   * Parse every job of a CI file
   *
   * Hidden (`.name`) and reserved top-level keys are skipped. Jobs without
   * tags inherit `default.tags`.
   *
   * @throws InvalidJobError when the document or a job cannot be read
   */
  parsePipeline(yamlContent: string): JobRequirement[] {
    let document: unknown;
    try {
      document = yaml.load(yamlContent);
    } catch (error) {
      throw new InvalidJobError(`Invalid CI file: ${errorMessage(error)}`);
    }

    if (!isRecord(document)) {
      throw new InvalidJobError('Invalid CI file: expected a mapping of jobs');
    }

    const defaults = pipelineDefaultsSchema.safeParse(document['default'] ?? {});
    const defaultTags = defaults.success ? defaults.data.tags : undefined;

    const requirements: JobRequirement[] = [];
    for (const [key, value] of Object.entries(document)) {
      if (key.startsWith('.') || RESERVED_PIPELINE_KEYS.has(key) || !isRecord(value)) {
        continue;
      }

      const parsed = jobDeclarationSchema.safeParse(value);
      if (!parsed.success) {
        throw new InvalidJobError(`Invalid job '${key}'`, formatIssues(parsed.error));
      }

      const job = parsed.data;
      if (job.tags === undefined && defaultTags !== undefined) {
        job.tags = defaultTags;
      }
      requirements.push(this.parse(job, key));
    }

    return requirements;
  }
}

/**
 * Parse a CI timeout into seconds
 *
 * Accepts seconds or strings such as "1h 30m" and "45 minutes".
 * Anything unreadable falls back to one hour.
 */
export function parseTimeout(timeout: number | string): number {
  if (typeof timeout === 'number') {
    return Math.floor(timeout);
  }

  const trimmed = timeout.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const units: Array<[RegExp, number]> = [
    [/(\d+)\s*h/i, 3600],
    [/(\d+)\s*m/i, 60],
    [/(\d+)\s*s/i, 1],
  ];

  let total = 0;
  for (const [pattern, multiplier] of units) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) {
      total += parseInt(match[1], 10) * multiplier;
    }
  }

  return total > 0 ? total : DEFAULT_TIMEOUT_SECONDS;
}

function toTagList(tags: JobDeclaration['tags']): string[] {
  if (tags === undefined) return [];
  return (Array.isArray(tags) ? tags : [tags]).filter(t => t.trim().length > 0);
}

function imageName(image: ImageReference | undefined): string {
  if (image === undefined) return '';
  return typeof image === 'string' ? image : image.name;
}

function resourceHints(variables: Record<string, unknown> | undefined): JobRequirement['resourceHints'] {
  const hints: JobRequirement['resourceHints'] = {};
  const memory = variables?.['CI_RUNNER_MEMORY'];
  const cpu = variables?.['CI_RUNNER_CPU'];

  if (typeof memory === 'string' || typeof memory === 'number') {
    hints.memory = String(memory);
  }
  if (typeof cpu === 'string' || typeof cpu === 'number') {
    hints.cpu = String(cpu);
  }
  return hints;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
