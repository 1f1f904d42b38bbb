/**
 * Support Handler Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createSupportHandlers } from './support.handler.js';
import { SupportRuntime } from '../../runtime/SupportRuntime.js';
import { createDemoIntentClassifier, createDemoSentimentClassifier } from '../../agents/ScriptedClassifier.js';
import { InvalidParamsError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { JsonRpcHandler } from '../json-rpc.js';

describe('createSupportHandlers', () => {
  let runtime: SupportRuntime;
  let handlers: Map<string, JsonRpcHandler>;

  const call = (method: string, params?: unknown): Promise<unknown> => {
    const handler = handlers.get(method);
    if (!handler) {
      throw new Error(`no handler for ${method}`);
    }
    return handler(params);
  };

  beforeEach(() => {
    runtime = new SupportRuntime({
      logger: createLogger({ level: 'error' }),
      transcriptWriter: { writeConversation: () => undefined },
      sentimentClassifier: createDemoSentimentClassifier(),
      intentClassifier: createDemoIntentClassifier(),
    });
    runtime.start();
    handlers = createSupportHandlers(runtime);
  });

  afterEach(async () => {
    await runtime.shutdown();
  });

  it('should register every support method', () => {
    expect(Array.from(handlers.keys()).sort()).toEqual([
      'chat.respond',
      'chat.send',
      'classifier.intent',
      'classifier.sentiment',
      'escalation.request',
      'escalation.resolve',
      'operator.available',
      'queue.status',
      'session.get',
      'stats.get',
    ]);
  });

  it('should publish a customer message and report the session state', async () => {
    const result = await call('chat.send', { sessionId: 'c1', text: 'where is my order?' });

    expect(result).toMatchObject({ sessionId: 'c1', status: 'ACTIVE', messages: 1 });
    expect(runtime.registry.get('c1')?.currentIntent).toBe('track_order');
  });

  it('should reject params that fail validation', async () => {
    await expect(call('chat.send', { sessionId: 'c1' })).rejects.toBeInstanceOf(InvalidParamsError);
    await expect(call('chat.send', { sessionId: 'c1', text: 'hi', customerEmail: 'not-an-email' })).rejects.toThrow(
      'Invalid params for chat.send'
    );
  });

  it('should end the conversation on a final reply', async () => {
    await call('chat.send', { sessionId: 'c2', text: 'I want to return these shoes' });

    const result = await call('chat.respond', { sessionId: 'c2', text: 'Label sent.', agent: 'returns', final: true });

    expect(result).toMatchObject({ ended: true });
    expect(runtime.registry.has('c2')).toBe(false);
  });

  it('should report a conversation as ended while its transcript is still being written', async () => {
    const finishers: Array<() => void> = [];
    const archiving = new SupportRuntime({
      logger: createLogger({ level: 'error' }),
      transcriptWriter: {
        writeConversation: () =>
          new Promise<void>((resolve) => {
            finishers.push(resolve);
          }),
      },
      sentimentClassifier: createDemoSentimentClassifier(),
      intentClassifier: createDemoIntentClassifier(),
    });
    archiving.start();
    const archivingHandlers = createSupportHandlers(archiving);
    const send = (method: string, params: unknown): Promise<unknown> => {
      const handler = archivingHandlers.get(method);
      if (!handler) {
        throw new Error(`no handler for ${method}`);
      }
      return handler(params);
    };

    await send('chat.send', { sessionId: 'a1', text: 'I want to return these shoes' });
    const interim = await send('chat.respond', { sessionId: 'a1', text: 'Checking that for you.' });
    const last = await send('chat.respond', { sessionId: 'a1', text: 'Label sent.', final: true });

    expect(interim).toMatchObject({ ended: false });
    expect(last).toMatchObject({ ended: true });
    expect(finishers).toHaveLength(1);

    for (const finish of finishers) {
      finish();
    }
    await archiving.shutdown();
  });

  it('should queue an escalation request and hand it to an operator', async () => {
    await call('chat.send', { sessionId: 'c3', text: 'what are your opening hours' });
    expect(runtime.registry.get('c3')?.status).toBe('ACTIVE');

    const requested = await call('escalation.request', {
      sessionId: 'c3',
      reason: 'CUSTOMER_REQUESTED_HUMAN',
      priority: 'HIGH',
    });
    expect(requested).toMatchObject({ queuePosition: 1 });

    const status = await call('queue.status');
    expect(status).toMatchObject({ queueSize: 1, queue: [{ sessionId: 'c3', priority: 'HIGH', position: 1 }] });

    const available = await call('operator.available', { operatorId: 'op-7', operatorName: 'Sam' });
    expect(available).toMatchObject({
      assignment: { assigned: true, operator_id: 'op-7', operator_name: 'Sam', session_id: 'c3' },
    });
    expect(runtime.registry.get('c3')?.operatorId).toBe('op-7');

    const resolved = await call('escalation.resolve', { sessionId: 'c3', operatorId: 'op-7', notes: 'done' });
    expect(resolved).toMatchObject({ resolved: true, closed: { session_id: 'c3', operator_id: 'op-7', notes: 'done' } });
    expect(runtime.registry.has('c3')).toBe(false);
  });

  it('should report an empty queue to an available operator', async () => {
    const result = await call('operator.available', { operatorId: 'op-1' });

    expect(result).toMatchObject({ assignment: { assigned: false, operator_id: 'op-1', reason: 'QUEUE_EMPTY' } });
  });

  it('should report an unresolved escalation when nothing is queued', async () => {
    const result = await call('escalation.resolve', { sessionId: 'missing', operatorId: 'op-1' });

    expect(result).toMatchObject({ resolved: false, closed: null });
  });

  it('should accept classifier results from outside the process', async () => {
    const external = new SupportRuntime({
      logger: createLogger({ level: 'error' }),
      transcriptWriter: { writeConversation: () => undefined },
    });
    external.start();
    const externalHandlers = createSupportHandlers(external);
    const send = (method: string, params: unknown): Promise<unknown> => {
      const handler = externalHandlers.get(method);
      if (!handler) {
        throw new Error(`no handler for ${method}`);
      }
      return handler(params);
    };

    await send('chat.send', { sessionId: 'x1', text: 'cancel my subscription' });
    await send('classifier.sentiment', { sessionId: 'x1', sentiment: 'neutral', confidence: 0.7 });
    const result = await send('classifier.intent', {
      sessionId: 'x1',
      intent: 'cancel_subscription',
      confidence: 0.9,
      entities: { plan: 'pro' },
    });

    expect(result).toMatchObject({ status: 'ESCALATED' });
    expect(external.registry.get('x1')).toMatchObject({
      currentSentiment: 'neutral',
      currentIntent: 'cancel_subscription',
      escalationReason: 'UNKNOWN_INTENT',
      entities: { plan: 'pro' },
    });
    await external.shutdown();
  });

  it('should return a snapshot for a live session and flag unknown ones', async () => {
    await call('chat.send', { sessionId: 'c4', text: 'thanks, great service' });

    const live = await call('session.get', { sessionId: 'c4' });
    expect(live).toMatchObject({
      exists: true,
      session: { session_id: 'c4', current_sentiment: 'POSITIVE', messages: [{ sender: 'USER', text: 'thanks, great service' }] },
    });

    expect(await call('session.get', { sessionId: 'nope' })).toEqual({ exists: false, sessionId: 'nope' });
  });

  it('should expose runtime stats', async () => {
    await call('chat.send', { sessionId: 'c5', text: 'track my package please' });

    const stats = await call('stats.get');
    expect(stats).toMatchObject({ coordinator: { messagesProcessed: 1 }, registry: { sessionsCreated: 1 } });
  });
});
