import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BanditState } from '@gantry/shared';
import { StatePersistenceError, errorMessage } from '../errors.js';
import { parseState, type StateBackend } from './backend.js';

/**
 * JSON document on the local filesystem
 *
 * Writes go to a temporary file that is renamed over the target, so a
 * reader never sees a half-written document. A missing file is an
 * empty state.
 */
export class FileStateBackend implements StateBackend {
  readonly description: string;

  constructor(private filePath: string) {
    this.description = `file:${filePath}`;
  }

  async load(): Promise<BanditState> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new StatePersistenceError(`Cannot read ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StatePersistenceError(`Invalid JSON in ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    return parseState(raw);
  }

  async save(state: BanditState): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new StatePersistenceError(`Cannot write ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
