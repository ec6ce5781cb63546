/**
 * Completion Event Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { encodeMessage } from '@gantry/shared';
import { CompletionListener, type CompletionMessage, type CompletionSubscriber } from '../completion-listener.js';
import { outcomeFromBuildEvent } from '../gitlab.js';
import { CapabilityOntology } from '../../ontology/index.js';
import { UnknownRunnerError } from '../../errors.js';
import { createRecordingLogger } from '../../__tests__/helpers.js';

/**
 * In-process stand-in for a NATS connection
 */
class FakeSubscriber implements CompletionSubscriber {
  handlers = new Map<string, (err: Error | null, msg: CompletionMessage) => void>();
  unsubscribed = 0;

  subscribe(subject: string, opts: { callback: (err: Error | null, msg: CompletionMessage) => void }) {
    this.handlers.set(subject, opts.callback);
    return {
      unsubscribe: () => {
        this.unsubscribed++;
        this.handlers.delete(subject);
      },
    };
  }

  publish(subject: string, data: Uint8Array): void {
    this.handlers.get(subject)?.(null, { data });
  }
}

describe('outcomeFromBuildEvent', () => {
  let fleet: CapabilityOntology;

  beforeEach(() => {
    fleet = new CapabilityOntology();
    fleet.register({ runnerKey: 'nordic', displayName: 'Nordic Cloud Runner', capabilities: ['gcp'], externalId: 4242 });
    fleet.register({ runnerKey: 'mac-docker', capabilities: ['docker'] });
  });

  it('should map a finished job by runner id', () => {
    expect(outcomeFromBuildEvent({
      object_kind: 'build',
      build_status: 'success',
      build_duration: 93.5,
      runner: { id: 4242, description: 'something else' },
    }, fleet)).toEqual({
      kind: 'outcome',
      outcome: { runnerKey: 'nordic', success: true, durationSeconds: 93.5 },
    });
  });

  it('should map by runner key or display name', () => {
    expect(outcomeFromBuildEvent({
      object_kind: 'build',
      build_status: 'failed',
      build_duration: 12,
      runner: { id: 1, description: 'mac-docker' },
    }, fleet)).toMatchObject({ kind: 'outcome', outcome: { runnerKey: 'mac-docker', success: false } });

    expect(outcomeFromBuildEvent({
      object_kind: 'build',
      build_status: 'failed',
      runner: { description: 'Nordic Cloud Runner' },
    }, fleet)).toEqual({
      kind: 'outcome',
      outcome: { runnerKey: 'nordic', success: false, durationSeconds: 0 },
    });
  });

  it('should ignore events it cannot use', () => {
    expect(outcomeFromBuildEvent({ object_kind: 'pipeline', build_status: 'success' }, fleet)).toEqual({
      kind: 'ignored',
      reason: 'Unsupported event kind: pipeline',
    });
    expect(outcomeFromBuildEvent({ object_kind: 'build', build_status: 'running', runner: { id: 4242 } }, fleet)).toEqual({
      kind: 'ignored',
      reason: 'Job status running is not final',
    });
    expect(outcomeFromBuildEvent({ object_kind: 'build', build_status: 'success', runner: null }, fleet)).toEqual({
      kind: 'ignored',
      reason: 'Event has no runner',
    });
    expect(outcomeFromBuildEvent({ object_kind: 'build', build_status: 'success', runner: { id: 7 } }, fleet)).toEqual({
      kind: 'ignored',
      reason: 'Runner #7 is not registered',
    });
    expect(outcomeFromBuildEvent('hello', fleet)).toEqual({ kind: 'ignored', reason: 'Not a GitLab job event' });
  });
});

describe('CompletionListener', () => {
  let nc: FakeSubscriber;
  let sink: { reportOutcome: ReturnType<typeof vi.fn> };
  let listener: CompletionListener;
  let logger: ReturnType<typeof createRecordingLogger>;

  beforeEach(() => {
    nc = new FakeSubscriber();
    sink = { reportOutcome: vi.fn(async () => undefined) };
    logger = createRecordingLogger();
    listener = new CompletionListener(nc, 'ci', sink, logger);
  });

  it('should subscribe to the project completion subject', () => {
    listener.start();
    listener.start();

    expect(listener.subject).toBe('gantry.ci.jobs.completed');
    expect(Array.from(nc.handlers.keys())).toEqual(['gantry.ci.jobs.completed']);
  });

  it('should report valid events', async () => {
    const recorded = await listener.handle(encodeMessage({
      runnerKey: 'nordic',
      success: true,
      durationSeconds: 120,
      decisionId: 'decision-1',
    }));

    expect(recorded).toBe(true);
    expect(sink.reportOutcome).toHaveBeenCalledWith({
      runnerKey: 'nordic',
      success: true,
      durationSeconds: 120,
      decisionId: 'decision-1',
    });
  });

  it('should deliver published events through the subscription', async () => {
    listener.start();

    nc.publish('gantry.ci.jobs.completed', encodeMessage({ runnerKey: 'nordic', success: false, durationSeconds: 5 }));

    await vi.waitFor(() => expect(sink.reportOutcome).toHaveBeenCalledTimes(1));
  });

  it('should drop malformed events', async () => {
    expect(await listener.handle(new TextEncoder().encode('not json'))).toBe(false);
    expect(await listener.handle(encodeMessage({ runnerKey: 'nordic', success: 'yes' }))).toBe(false);

    expect(sink.reportOutcome).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('should drop events for unknown runners', async () => {
    sink.reportOutcome.mockRejectedValue(new UnknownRunnerError('ghost'));

    expect(await listener.handle(encodeMessage({ runnerKey: 'ghost', success: true, durationSeconds: 1 }))).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      'Dropping completion event for ghost: Cannot record outcome for unknown runner: ghost'
    );
  });

  it('should unsubscribe on stop', () => {
    listener.start();
    listener.stop();

    expect(nc.unsubscribed).toBe(1);
    expect(nc.handlers.size).toBe(0);
  });
});
