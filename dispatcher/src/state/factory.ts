import type { JetStreamClient } from 'nats';
import type { StateConfiguration } from '@gantry/shared';
import { KVBuckets } from '@gantry/shared';
import { ConfigurationError } from '../errors.js';
import type { StateBackend } from './backend.js';
import { MemoryStateBackend } from './memory.js';
import { FileStateBackend } from './file.js';
import { openNatsKvStateBackend } from './nats-kv.js';

/**
 * Build the configured backend
 *
 * @param js JetStream client, required for nats-kv
 */
export async function createStateBackend(
  config: StateConfiguration,
  projectId: string,
  js?: JetStreamClient,
): Promise<StateBackend> {
  switch (config.backend) {
    case 'memory':
      return new MemoryStateBackend();

    case 'file':
      return new FileStateBackend(config.filePath);

    case 'nats-kv':
      if (!js) {
        throw new ConfigurationError('STATE_BACKEND=nats-kv needs NATS (set NATS_ENABLED=true)');
      }
      return openNatsKvStateBackend(js, config.bucket ?? KVBuckets.banditState(projectId), config.key);
  }
}
