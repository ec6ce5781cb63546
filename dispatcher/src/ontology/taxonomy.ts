import type { CapabilityKind } from '@gantry/shared';

/**
 * Standard capability taxonomy
 *
 * Capabilities not listed here are classified as `custom`.
 */
export const STANDARD_CAPABILITIES: Readonly<Record<string, CapabilityKind>> = {
  // Executors
  docker: 'executor',
  shell: 'executor',
  kubernetes: 'executor',
  'docker-machine': 'executor',

  // Platforms
  linux: 'platform',
  macos: 'platform',
  windows: 'platform',

  // Cloud providers
  gcp: 'cloud',
  aws: 'cloud',
  azure: 'cloud',
  cloud: 'cloud',

  // Hardware
  gpu: 'hardware',
  arm64: 'hardware',
  x86_64: 'hardware',

  // Regions
  nordic: 'network',
  'eu-west': 'network',
  'us-east': 'network',
};

/**
 * Default implication rules (A implies each of B)
 */
export const DEFAULT_IMPLICATIONS: Readonly<Record<string, readonly string[]>> = {
  docker: ['linux'],
  gcp: ['cloud'],
  aws: ['cloud'],
  azure: ['cloud'],
  nordic: ['eu-west', 'gcp'],
};

export function capabilityKind(capability: string): CapabilityKind {
  return STANDARD_CAPABILITIES[capability] ?? 'custom';
}

/**
 * Canonical form of a capability or tag token
 */
export function normalizeCapability(token: string): string {
  return token.trim().toLowerCase();
}
