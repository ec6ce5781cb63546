// NATS client utilities
export {
  createNATSClient,
  parseNatsUrl,
  encodeMessage,
  decodeMessage,
  type ConnectedClient,
  type ParsedNatsUrl,
} from './client.js';

// Subject patterns
export {
  buildSubject,
  JobSubjects,
  DispatcherSubjects,
  KVBuckets,
} from './subjects.js';
