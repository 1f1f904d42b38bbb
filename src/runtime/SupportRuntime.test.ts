/**
 * SupportRuntime Integration Tests
 *
 * Whole conversations through real components, with scripted classifiers
 * and an in-memory transcript writer.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SupportRuntime } from './SupportRuntime.js';
import { createDemoIntentClassifier, createDemoSentimentClassifier } from '../agents/ScriptedClassifier.js';
import { getDefaultConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import type { TranscriptRecord } from '../transcripts/types.js';

describe('SupportRuntime', () => {
  let runtime: SupportRuntime;
  let written: TranscriptRecord[];

  beforeEach(() => {
    written = [];
    runtime = new SupportRuntime({
      logger: createLogger({ level: 'error' }),
      transcriptWriter: {
        writeConversation: (record) => {
          written.push(record);
        },
      },
      sentimentClassifier: createDemoSentimentClassifier(),
      intentClassifier: createDemoIntentClassifier(),
    });
    runtime.start();
  });

  afterEach(async () => {
    await runtime.shutdown();
  });

  it('should route, answer and archive a conversation', () => {
    runtime.broker.subscribe('handle-returns', (event) => {
      runtime.broker.publish('agent-response', {
        session_id: event.payload.session_id,
        text: 'A return label has been emailed to you.',
        agent: 'returns',
        final: true,
      });
    });

    runtime.broker.publish('new-message', { session_id: 's1', text: 'I want to return my laptop' });

    expect(runtime.registry.count()).toBe(0);
    expect(written).toHaveLength(1);
    expect(written[0]).toMatchObject({
      session_id: 's1',
      status: 'RESOLVED',
      end_reason: 'RESOLVED_BY_AGENT',
      conversation: {
        current_sentiment: 'NEUTRAL',
        current_intent: 'process_return',
        messages: [
          { sender: 'USER', text: 'I want to return my laptop' },
          { sender: 'AGENT', text: 'A return label has been emailed to you.' },
        ],
      },
    });
    expect(runtime.getStats().coordinator).toMatchObject({ messagesProcessed: 1, routed: 1, escalations: 0 });
  });

  it('should carry an angry customer through the operator queue', () => {
    runtime.broker.publish('new-message', { session_id: 's2', text: 'This is ridiculous, my order is late' });

    expect(runtime.registry.get('s2')?.status).toBe('ESCALATED');
    expect(runtime.escalationQueue.positionOf('s2')).toBe(1);

    runtime.broker.publish('operator-available', { operator_id: 'op-1', operator_name: 'Dana' });
    expect(runtime.registry.get('s2')?.operatorId).toBe('op-1');

    runtime.broker.publish('escalation-resolved', { session_id: 's2', operator_id: 'op-1', notes: 'voucher issued' });

    expect(runtime.registry.count()).toBe(0);
    expect(written[0]).toMatchObject({
      session_id: 's2',
      status: 'RESOLVED',
      end_reason: 'RESOLVED_BY_OPERATOR',
      operator_id: 'op-1',
      conversation: {
        escalation_reason: 'NEGATIVE_SENTIMENT_ANGRY',
        operator_id: 'op-1',
      },
    });
    expect(runtime.getStats().escalation).toMatchObject({ totalEscalations: 1, resolved: 1, queued: 0, assigned: 0 });
  });

  it('should drop a waiting escalation when the conversation times out', () => {
    runtime.broker.publish('new-message', { session_id: 's2', text: 'This is ridiculous, my order is late' });
    expect(runtime.escalationQueue.positionOf('s2')).toBe(1);

    runtime.broker.publish('conversation-timeout', { session_id: 's2', idle_seconds: 900 });

    expect(runtime.registry.has('s2')).toBe(false);
    expect(runtime.escalationQueue.has('s2')).toBe(false);
    expect(written[0]).toMatchObject({ session_id: 's2', status: 'ABANDONED', end_reason: 'TIMEOUT' });

    const assigned: unknown[] = [];
    runtime.broker.subscribe('operator-assigned', (event) => assigned.push(event.payload));
    runtime.broker.publish('operator-available', { operator_id: 'op-1' });

    expect(assigned).toEqual([{ assigned: false, operator_id: 'op-1', reason: 'QUEUE_EMPTY' }]);
    expect(runtime.getStats().escalation).toMatchObject({ totalEscalations: 1, withdrawn: 1, resolved: 0, queued: 0 });
  });

  it('should open a fresh conversation for a message sent while the transcript is written', async () => {
    const started: TranscriptRecord[] = [];
    const finishers: Array<() => void> = [];
    const slow = new SupportRuntime({
      logger: createLogger({ level: 'error' }),
      transcriptWriter: {
        writeConversation: (record) => {
          started.push(record);
          return new Promise<void>((resolve) => {
            finishers.push(resolve);
          });
        },
      },
      sentimentClassifier: createDemoSentimentClassifier(),
      intentClassifier: createDemoIntentClassifier(),
    });
    slow.start();
    const saved: string[] = [];
    slow.broker.subscribe('transcript-saved', (event) => saved.push(String(event.payload.session_id)));
    slow.broker.subscribe('handle-returns', (event) => {
      slow.broker.publish('agent-response', {
        session_id: event.payload.session_id,
        text: 'A return label has been emailed to you.',
        final: true,
      });
    });

    slow.broker.publish('new-message', { session_id: 's1', text: 'I want to return my laptop' });
    expect(slow.registry.has('s1')).toBe(false);

    slow.broker.publish('new-message', { session_id: 's1', text: 'This is ridiculous, no label arrived' });

    expect(started).toHaveLength(1);
    expect(slow.registry.get('s1')?.messages.map((message) => message.text)).toEqual([
      'This is ridiculous, no label arrived',
    ]);
    expect(slow.registry.get('s1')?.status).toBe('ESCALATED');
    expect(slow.escalationQueue.positionOf('s1')).toBe(1);

    for (const finish of finishers) {
      finish();
    }
    await slow.recorder.flush();

    expect(saved).toEqual(['s1']);
    expect(slow.registry.has('s1')).toBe(true);
    await slow.shutdown();
  });

  it('should escalate an unrecognised request', () => {
    runtime.broker.publish('new-message', { session_id: 's3', text: 'Can you sing me a song?' });

    expect(runtime.registry.get('s3')?.escalationReason).toBe('LOW_INTENT_CONFIDENCE');
    expect(runtime.escalationQueue.getStatus().queue.map((entry) => entry.sessionId)).toEqual(['s3']);
  });

  it('should keep separate runtimes isolated', async () => {
    const other = new SupportRuntime({
      logger: createLogger({ level: 'error' }),
      transcriptWriter: { writeConversation: () => undefined },
    });
    other.start();

    runtime.broker.publish('new-message', { session_id: 's1', text: 'hello' });

    expect(other.registry.count()).toBe(0);
    await other.shutdown();
  });

  it('should run the watchdog only when enabled', async () => {
    expect(runtime.watchdog).toBeNull();

    const config = getDefaultConfig();
    config.watchdog.enabled = true;
    const watched = new SupportRuntime({
      config,
      logger: createLogger({ level: 'error' }),
      transcriptWriter: { writeConversation: () => undefined },
    });
    watched.start();
    expect(watched.watchdog?.isRunning()).toBe(true);

    await watched.shutdown();
    expect(watched.watchdog?.isRunning()).toBe(false);
    expect(watched.isStarted()).toBe(false);
  });
});
