/**
 * Requirement mapping tables
 *
 * Tags map to required capabilities. Image and service names only ever
 * map to preferred capabilities.
 */

/**
 * Declared tag to required capabilities
 */
export const DEFAULT_TAG_MAPPINGS: Readonly<Record<string, readonly string[]>> = {
  'docker-any': ['docker'],
  docker: ['docker'],
  shell: ['shell'],
  kubernetes: ['kubernetes'],
  k8s: ['kubernetes'],
  gcp: ['gcp'],
  aws: ['aws'],
  azure: ['azure'],
  gpu: ['gpu'],
  nordic: ['nordic', 'gcp'],
  macos: ['macos', 'shell'],
  windows: ['windows'],
  linux: ['linux'],
  arm64: ['arm64'],
  local: ['local'],
};

export interface PatternRule {
  pattern: RegExp;
  capabilities: readonly string[];
}

/**
 * Image name patterns to preferred capabilities
 */
export const IMAGE_PATTERNS: readonly PatternRule[] = [
  { pattern: /nvidia|cuda/i, capabilities: ['gpu'] },
  { pattern: /arm64|aarch64/i, capabilities: ['arm64'] },
  { pattern: /windows/i, capabilities: ['windows'] },
  { pattern: /alpine|ubuntu|debian|centos/i, capabilities: ['linux'] },
];

/**
 * Service name substrings to preferred capabilities
 */
export const SERVICE_PATTERNS: Readonly<Record<string, readonly string[]>> = {
  'docker:dind': ['docker'],
  postgres: ['linux'],
  mysql: ['linux'],
  redis: ['linux'],
  mongo: ['linux'],
};

/**
 * Capability preferred whenever a job names a container image
 */
export const IMAGE_RUNTIME_CAPABILITY = 'docker';

/**
 * Top-level keys of a CI file that are not jobs
 */
export const RESERVED_PIPELINE_KEYS: ReadonlySet<string> = new Set([
  'default',
  'include',
  'variables',
  'stages',
  'workflow',
  'image',
  'services',
  'cache',
  'before_script',
  'after_script',
]);

export const DEFAULT_TIMEOUT_SECONDS = 3600;
