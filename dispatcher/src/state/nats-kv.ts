import type { JetStreamClient } from 'nats';
import type { BanditState } from '@gantry/shared';
import { StatePersistenceError, errorMessage } from '../errors.js';
import { parseState, type StateBackend } from './backend.js';

/**
 * The part of a NATS KV bucket this backend uses
 */
export interface KvStore {
  get(key: string): Promise<{ operation: string; string(): string } | null>;
  put(key: string, data: string): Promise<number>;
}

/**
 * Whole state document stored under one key of a JetStream KV bucket
 *
 * Last writer wins; there is no revision check.
 */
export class NatsKvStateBackend implements StateBackend {
  readonly description: string;

  constructor(
    private kv: KvStore,
    bucket: string,
    private key: string,
  ) {
    this.description = `nats-kv:${bucket}/${key}`;
  }

  async load(): Promise<BanditState> {
    let entry: Awaited<ReturnType<KvStore['get']>>;
    try {
      entry = await this.kv.get(this.key);
    } catch (error) {
      throw new StatePersistenceError(`Cannot read ${this.description}: ${errorMessage(error)}`, { cause: error });
    }

    if (!entry || entry.operation !== 'PUT') {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(entry.string());
    } catch (error) {
      throw new StatePersistenceError(`Invalid JSON in ${this.description}: ${errorMessage(error)}`, { cause: error });
    }

    return parseState(raw);
  }

  async save(state: BanditState): Promise<void> {
    try {
      await this.kv.put(this.key, JSON.stringify(state));
    } catch (error) {
      throw new StatePersistenceError(`Cannot write ${this.description}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Open (creating if needed) the bucket and bind a backend to it
 */
export async function openNatsKvStateBackend(
  js: JetStreamClient,
  bucket: string,
  key: string,
): Promise<NatsKvStateBackend> {
  const kv = await js.views.kv(bucket, { history: 5 });
  return new NatsKvStateBackend(kv, bucket, key);
}
