export {
  parseState,
  emptyArm,
  cloneState,
  type StateBackend,
} from './backend.js';

export { MemoryStateBackend } from './memory.js';
export { FileStateBackend } from './file.js';
export {
  NatsKvStateBackend,
  openNatsKvStateBackend,
  type KvStore,
} from './nats-kv.js';

export { createStateBackend } from './factory.js';
