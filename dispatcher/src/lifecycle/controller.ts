import { EventEmitter } from 'node:events';
import type {
  CapacityActionResult,
  ComputeCommandResult,
  ComputeConfig,
  LifecyclePhase,
  LifecycleState,
} from '@gantry/shared';
import { silentLogger, type Logger } from '@gantry/shared';
import { errorMessage } from '../errors.js';
import { createComputeRunner, type ComputeAction, type ComputeRunner } from './compute.js';

/**
 * Configuration for the lifecycle controller
 */
export interface LifecycleControllerConfig {
  /** Whether the controller acts at all */
  enabled?: boolean;

  /** Idle period after the last selection before auto-started capacity is stopped (ms) */
  idleShutdownMs?: number;

  /** How often the shutdown deadline is checked (ms) */
  checkIntervalMs?: number;

  compute?: ComputeConfig;

  /** Overrides the runner built from `compute` */
  runner?: ComputeRunner;

  logger?: Logger;
}

/**
 * Starts on-demand capacity when the fleet is offline and stops it again
 * after a period without selections
 *
 * The idle timer is a single deadline checked by tick(). Re-arming
 * overwrites the deadline, so at most one stop is ever pending. Only
 * capacity this controller started itself (`autoStarted`) is stopped on
 * idle timeout.
 *
 * Events:
 * - 'capacity:started' (result, autoStarted)
 * - 'capacity:stopped' (result)
 * - 'capacity:failed' (action, error message)
 */
export class LifecycleController extends EventEmitter {
  private config: Required<Pick<LifecycleControllerConfig, 'enabled' | 'idleShutdownMs' | 'checkIntervalMs'>>;
  private runner: ComputeRunner | null;
  private logger: Logger;
  private checkInterval: NodeJS.Timeout | null = null;

  private autoStarted = false;
  private startedAt: number | null = null;
  private shutdownDeadline: number | null = null;
  private phase: LifecyclePhase = 'idle';

  constructor(config: LifecycleControllerConfig = {}) {
    super();
    this.config = {
      enabled: config.enabled ?? true,
      idleShutdownMs: config.idleShutdownMs ?? 300000, // 5 minutes
      checkIntervalMs: config.checkIntervalMs ?? 15000,
    };
    this.runner = config.runner ?? createComputeRunner(config.compute ?? { mechanism: 'none' });
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Whether a compute mechanism is configured and the controller is enabled
   */
  get configured(): boolean {
    return this.config.enabled && this.runner !== null;
  }

  get idleShutdownMs(): number {
    return this.config.idleShutdownMs;
  }

  /**
   * Start capacity unless it is already starting or running
   *
   * A repeated call only pushes the shutdown deadline out. Failures are
   * returned, not thrown.
   */
  async ensureCapacity(now: number = Date.now()): Promise<CapacityActionResult> {
    const runner = this.runner;
    if (!this.config.enabled || runner === null) {
      return this.result('not-configured', 'No compute mechanism configured');
    }

    if (this.phase === 'starting' || this.phase === 'running') {
      this.armIdleShutdown(this.config.idleShutdownMs, now);
      return this.result('already-started', 'Capacity already started');
    }

    if (this.phase === 'stopping') {
      return this.result('skipped', 'Capacity is being stopped');
    }

    this.phase = 'starting';
    let command: ComputeCommandResult;
    try {
      command = await runner('start');
    } catch (error) {
      this.phase = 'idle';
      return this.failure('start', error);
    }

    this.autoStarted = true;
    this.startedAt = now;
    this.phase = 'running';
    this.armIdleShutdown(this.config.idleShutdownMs, now);

    this.logger.info(`Capacity auto-started: ${command.message}. Stops after ${this.config.idleShutdownMs}ms idle.`);
    const result = this.result('started', command.message);
    this.emit('capacity:started', result, true);
    return result;
  }

  /**
   * (Re)schedule the idle shutdown
   *
   * Replaces any pending deadline. Does nothing while no capacity is up.
   *
   * @returns whether a deadline is now pending
   */
  armIdleShutdown(delayMs: number = this.config.idleShutdownMs, now: number = Date.now()): boolean {
    if (!this.config.enabled || this.phase === 'idle') {
      return false;
    }
    this.shutdownDeadline = now + delayMs;
    return true;
  }

  /**
   * Fire the idle timeout if the deadline has passed
   */
  async tick(now: number = Date.now()): Promise<CapacityActionResult | null> {
    if (this.shutdownDeadline === null || now < this.shutdownDeadline) {
      return null;
    }
    return this.onIdleTimeout();
  }

  /**
   * Stop auto-started capacity
   *
   * Manually started capacity is left alone.
   */
  async onIdleTimeout(): Promise<CapacityActionResult> {
    this.shutdownDeadline = null;

    const runner = this.runner;
    if (runner === null) {
      return this.result('not-configured', 'No compute mechanism configured');
    }

    if (!this.autoStarted) {
      this.logger.debug('Idle timeout reached but capacity was not auto-started, leaving it running');
      return this.result('skipped', 'Capacity was not auto-started');
    }

    if (this.phase !== 'running') {
      return this.result('skipped', `Capacity is ${this.phase}`);
    }

    this.logger.info('Idle timeout reached, stopping auto-started capacity');
    return this.stopWith(runner);
  }

  /**
   * Operator start. Never marks the capacity as auto-started.
   */
  async startCapacity(now: number = Date.now()): Promise<CapacityActionResult> {
    const runner = this.runner;
    if (runner === null) {
      return this.result('not-configured', 'No compute mechanism configured');
    }

    if (this.phase !== 'idle') {
      return this.result('already-started', `Capacity is ${this.phase}`);
    }

    this.phase = 'starting';
    let command: ComputeCommandResult;
    try {
      command = await runner('start');
    } catch (error) {
      this.phase = 'idle';
      return this.failure('start', error);
    }

    this.autoStarted = false;
    this.startedAt = now;
    this.phase = 'running';

    this.logger.info(`Capacity started manually: ${command.message}`);
    const result = this.result('started', command.message);
    this.emit('capacity:started', result, false);
    return result;
  }

  /**
   * Operator stop. Issued whatever the phase, since capacity may have
   * been started outside this controller.
   */
  async stopCapacity(): Promise<CapacityActionResult> {
    const runner = this.runner;
    if (runner === null) {
      return this.result('not-configured', 'No compute mechanism configured');
    }

    if (this.phase === 'starting' || this.phase === 'stopping') {
      return this.result('skipped', `Capacity is ${this.phase}`);
    }

    return this.stopWith(runner);
  }

  getState(): LifecycleState {
    return {
      autoStarted: this.autoStarted,
      startedAt: this.startedAt !== null ? new Date(this.startedAt).toISOString() : null,
      shutdownDeadline: this.shutdownDeadline !== null ? new Date(this.shutdownDeadline).toISOString() : null,
      phase: this.phase,
    };
  }

  /**
   * Start checking the shutdown deadline
   */
  start(): void {
    if (this.checkInterval) {
      return;
    }

    this.checkInterval = setInterval(() => {
      this.tick().catch((error) => {
        this.logger.error(`Lifecycle tick failed: ${errorMessage(error)}`);
      });
    }, this.config.checkIntervalMs);
  }

  /**
   * Stop checking the shutdown deadline
   */
  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }

  /**
   * Stop checking and remove all listeners
   */
  shutdown(): void {
    this.stop();
    this.removeAllListeners();
  }

  private async stopWith(runner: ComputeRunner): Promise<CapacityActionResult> {
    const previous = this.phase;
    this.phase = 'stopping';

    let command: ComputeCommandResult;
    try {
      command = await runner('stop');
    } catch (error) {
      this.phase = previous;
      return this.failure('stop', error);
    }

    this.reset();

    this.logger.info(`Capacity stopped: ${command.message}`);
    const result = this.result('stopped', command.message);
    this.emit('capacity:stopped', result);
    return result;
  }

  private reset(): void {
    this.autoStarted = false;
    this.startedAt = null;
    this.shutdownDeadline = null;
    this.phase = 'idle';
  }

  private failure(action: ComputeAction, error: unknown): CapacityActionResult {
    const message = `Capacity ${action} failed: ${errorMessage(error)}`;
    this.logger.error(message);
    this.emit('capacity:failed', action, message);
    return this.result('failed', message);
  }

  private result(action: CapacityActionResult['action'], message: string): CapacityActionResult {
    return { action, message, state: this.getState() };
  }
}
