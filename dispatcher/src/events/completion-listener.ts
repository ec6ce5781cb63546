import { JobSubjects, decodeMessage, silentLogger, type Logger } from '@gantry/shared';
import { errorMessage } from '../errors.js';
import { formatIssues } from '../parser/index.js';
import type { OutcomeSubmission } from '../selector/index.js';
import { outcomeSchema } from './schemas.js';

export interface CompletionMessage {
  data: Uint8Array;
}

/**
 * The part of a NATS connection the listener uses
 */
export interface CompletionSubscriber {
  subscribe(
    subject: string,
    opts: { callback: (err: Error | null, msg: CompletionMessage) => void },
  ): { unsubscribe(): void };
}

export interface OutcomeSink {
  reportOutcome(report: OutcomeSubmission): Promise<unknown>;
}

/**
 * Folds job-completion events published on
 * `gantry.<project>.jobs.completed` into the bandit
 *
 * Bad events are logged and dropped.
 */
export class CompletionListener {
  private subscription: { unsubscribe(): void } | null = null;
  private logger: Logger;

  constructor(
    private nc: CompletionSubscriber,
    private projectId: string,
    private sink: OutcomeSink,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  get subject(): string {
    return JobSubjects.completed(this.projectId);
  }

  start(): void {
    if (this.subscription) {
      return;
    }

    this.subscription = this.nc.subscribe(this.subject, {
      callback: (err, msg) => {
        if (err) {
          this.logger.warn(`Completion subscription error: ${err.message}`);
          return;
        }
        this.handle(msg.data).catch((error) => {
          this.logger.error(`Completion handling failed: ${errorMessage(error)}`);
        });
      },
    });
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * @returns whether the event was recorded
   */
  async handle(data: Uint8Array): Promise<boolean> {
    let payload: unknown;
    try {
      payload = decodeMessage(data);
    } catch (error) {
      this.logger.warn(`Dropping completion event: ${errorMessage(error)}`);
      return false;
    }

    const parsed = outcomeSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn(`Dropping completion event: ${formatIssues(parsed.error).join('; ')}`);
      return false;
    }

    try {
      await this.sink.reportOutcome(parsed.data);
      return true;
    } catch (error) {
      this.logger.warn(`Dropping completion event for ${parsed.data.runnerKey}: ${errorMessage(error)}`);
      return false;
    }
  }
}
