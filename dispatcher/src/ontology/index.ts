export {
  CapabilityOntology,
  closeCapabilities,
  isReservedRunnerKey,
  RESERVED_RUNNER_KEYS,
  type RunnerDirectory,
  type OntologyConfig,
  type OntologySnapshot,
} from './ontology.js';

export {
  STANDARD_CAPABILITIES,
  DEFAULT_IMPLICATIONS,
  capabilityKind,
  normalizeCapability,
} from './taxonomy.js';
