import type { BanditState } from '@gantry/shared';
import { cloneState, type StateBackend } from './backend.js';

/**
 * Process-local backend. State is lost on restart.
 */
export class MemoryStateBackend implements StateBackend {
  readonly description = 'memory';
  private state: BanditState;

  constructor(initial: BanditState = {}) {
    this.state = cloneState(initial);
  }

  async load(): Promise<BanditState> {
    return cloneState(this.state);
  }

  async save(state: BanditState): Promise<void> {
    this.state = cloneState(state);
  }
}
