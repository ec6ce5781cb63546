export {
  RequirementParser,
  parseTimeout,
  formatIssues,
  type RequirementParserConfig,
} from './parser.js';

export {
  DEFAULT_TAG_MAPPINGS,
  IMAGE_PATTERNS,
  SERVICE_PATTERNS,
  RESERVED_PIPELINE_KEYS,
} from './rules.js';

export { jobDeclarationSchema } from './schema.js';
