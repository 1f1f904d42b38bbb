/**
 * Coordinator Unit Tests
 *
 * Gate decisions, escalation intake and conversation lifecycle, driven
 * entirely through broker events.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Coordinator } from './Coordinator.js';
import { EventBroker } from '../broker/EventBroker.js';
import { SessionRegistry } from '../sessions/SessionRegistry.js';
import { getDefaultConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import type { SupportEvent } from '../types/index.js';

describe('Coordinator', () => {
  let broker: EventBroker;
  let registry: SessionRegistry;
  let coordinator: Coordinator;

  const capture = (eventType: string): SupportEvent[] => {
    const events: SupportEvent[] = [];
    broker.subscribe(eventType, (event) => {
      events.push(event);
    });
    return events;
  };

  const sendMessage = (sessionId: string, text: string): void => {
    broker.publish('new-message', { session_id: sessionId, text });
  };

  beforeEach(() => {
    const logger = createLogger({ level: 'error' });
    broker = new EventBroker({ logger });
    registry = new SessionRegistry(logger);
    coordinator = new Coordinator({ broker, registry, logger, workflow: getDefaultConfig().workflow });
    coordinator.start();
  });

  describe('gate 0: new message', () => {
    it('should store the message and request sentiment', () => {
      const tasks = capture('sentiment-task');

      broker.publish('new-message', { session_id: 's1', text: 'hello', customer_email: 'user@example.com' });

      expect(tasks.map((e) => e.payload)).toEqual([{ session_id: 's1', text: 'hello' }]);
      expect(registry.get('s1')?.customerEmail).toBe('user@example.com');
      expect(registry.get('s1')?.messages.map((m) => [m.sender, m.text])).toEqual([['USER', 'hello']]);
    });

    it('should keep every message of a session in order', () => {
      for (let i = 1; i <= 5; i++) {
        sendMessage('s1', `message ${i}`);
      }

      expect(registry.get('s1')?.messages.map((m) => m.text)).toEqual([
        'message 1',
        'message 2',
        'message 3',
        'message 4',
        'message 5',
      ]);
      expect(coordinator.getStats().messagesProcessed).toBe(5);
    });

    it('should escalate with SYSTEM_ERROR when storing the message fails', () => {
      const escalations = capture('escalation-task');
      vi.spyOn(registry, 'addMessage').mockImplementation(() => {
        throw new Error('store unavailable');
      });

      sendMessage('s1', 'hello');

      expect(escalations).toHaveLength(1);
      expect(escalations[0]?.payload).toMatchObject({
        session_id: 's1',
        reason: 'SYSTEM_ERROR',
        priority: 'HIGH',
        details: { stage: 'gate 0', error: 'store unavailable' },
      });
      expect(registry.get('s1')?.status).toBe('ESCALATED');
      expect(coordinator.getStats().errors).toBe(1);
    });
  });

  describe('gate 1: sentiment result', () => {
    it('should escalate an ANGRY sentiment and never ask for intent', () => {
      const escalations = capture('escalation-task');
      const intentTasks = capture('intent-task');
      sendMessage('s1', 'this is ridiculous');

      broker.publish('sentiment-result', { session_id: 's1', sentiment: 'ANGRY', confidence: 0.97 });

      expect(escalations).toHaveLength(1);
      expect(escalations[0]?.payload.reason).toBe('NEGATIVE_SENTIMENT_ANGRY');
      expect(escalations[0]?.payload.priority).toBe('HIGH');
      expect(intentTasks).toHaveLength(0);
      expect(registry.get('s1')?.status).toBe('ESCALATED');
      expect(registry.get('s1')?.escalationReason).toBe('NEGATIVE_SENTIMENT_ANGRY');
    });

    it('should compare sentiment labels case-insensitively', () => {
      const escalations = capture('escalation-task');
      sendMessage('s1', 'meh');

      broker.publish('sentiment-result', { session_id: 's1', sentiment: 'negative' });

      expect(escalations[0]?.payload.reason).toBe('NEGATIVE_SENTIMENT_NEGATIVE');
    });

    it('should attach the conversation snapshot to the escalation', () => {
      const escalations = capture('escalation-task');
      sendMessage('s1', 'awful service');

      broker.publish('sentiment-result', { session_id: 's1', sentiment: 'ANGRY' });

      expect(escalations[0]?.payload.snapshot).toMatchObject({
        session_id: 's1',
        status: 'ESCALATED',
        current_sentiment: 'ANGRY',
        escalation_reason: 'NEGATIVE_SENTIMENT_ANGRY',
      });
    });

    it('should request intent with the latest text and user history', () => {
      const intentTasks = capture('intent-task');
      sendMessage('s1', 'hi there');
      sendMessage('s1', 'where is my package');

      broker.publish('sentiment-result', { session_id: 's1', sentiment: 'NEUTRAL', confidence: 0.6 });

      expect(intentTasks.map((e) => e.payload)).toEqual([
        { session_id: 's1', text: 'where is my package', history: ['hi there', 'where is my package'] },
      ]);
      expect(registry.get('s1')?.currentSentiment).toBe('NEUTRAL');
    });

    it('should ignore a result for a session that no longer exists', () => {
      const escalations = capture('escalation-task');
      const intentTasks = capture('intent-task');
      const errors = capture('agent-error');

      broker.publish('sentiment-result', { session_id: 'ghost', sentiment: 'ANGRY' });

      expect(escalations).toHaveLength(0);
      expect(intentTasks).toHaveLength(0);
      expect(errors).toHaveLength(0);
    });
  });

  describe('gate 2: intent result', () => {
    beforeEach(() => {
      sendMessage('s1', 'track my order 1234');
      broker.publish('sentiment-result', { session_id: 's1', sentiment: 'NEUTRAL' });
    });

    it('should escalate just below the confidence threshold', () => {
      const escalations = capture('escalation-task');
      const routed = capture('handle-order-tracking');

      broker.publish('intent-result', { session_id: 's1', intent: 'track_order', confidence: 0.7 - 1e-9 });

      expect(escalations).toHaveLength(1);
      expect(escalations[0]?.payload.reason).toBe('LOW_INTENT_CONFIDENCE');
      expect(escalations[0]?.payload.priority).toBe('NORMAL');
      expect(routed).toHaveLength(0);
    });

    it('should route at exactly the confidence threshold', () => {
      const escalations = capture('escalation-task');
      const routed = capture('handle-order-tracking');

      broker.publish('intent-result', { session_id: 's1', intent: 'track_order', confidence: 0.7 });

      expect(escalations).toHaveLength(0);
      expect(routed).toHaveLength(1);
      expect(coordinator.getStats().routed).toBe(1);
    });

    it('should escalate an intent with no route', () => {
      const escalations = capture('escalation-task');

      broker.publish('intent-result', { session_id: 's1', intent: 'buy_spaceship', confidence: 0.99 });

      expect(escalations[0]?.payload).toMatchObject({
        reason: 'UNKNOWN_INTENT',
        details: { intent: 'buy_spaceship' },
      });
    });

    it('should merge entities into the routed snapshot', () => {
      const routed = capture('handle-order-tracking');

      broker.publish('intent-result', {
        session_id: 's1',
        intent: 'track_order',
        confidence: 0.9,
        entities: { order_id: '1234' },
      });

      expect(routed[0]?.payload).toMatchObject({
        session_id: 's1',
        current_intent: 'track_order',
        entities: { order_id: '1234' },
      });
    });

    it('should let a late result overwrite a newer one', () => {
      broker.publish('intent-result', { session_id: 's1', intent: 'track_order', confidence: 0.9 });
      broker.publish('intent-result', { session_id: 's1', intent: 'general_inquiry', confidence: 0.8 });

      expect(registry.get('s1')?.currentIntent).toBe('general_inquiry');
    });
  });

  describe('malformed payloads', () => {
    it('should report an agent-error naming the coordinator and escalate', () => {
      const errors = capture('agent-error');
      const escalations = capture('escalation-task');
      sendMessage('s1', 'hello');

      broker.publish('intent-result', { session_id: 's1', intent: 'track_order' });

      expect(errors).toHaveLength(1);
      expect(errors[0]?.payload).toMatchObject({
        session_id: 's1',
        agent_name: 'coordinator',
        task: 'intent-result',
      });
      expect(escalations[0]?.payload.reason).toBe('AGENT_ERROR_coordinator');
    });

    it('should not escalate when the payload has no session id', () => {
      const errors = capture('agent-error');
      const escalations = capture('escalation-task');

      broker.publish('new-message', { text: 'orphan' });

      expect(errors).toHaveLength(1);
      expect(errors[0]?.payload.session_id).toBeUndefined();
      expect(escalations).toHaveLength(0);
      expect(registry.count()).toBe(0);
    });

    it('should only log a malformed agent-error', () => {
      const errors = capture('agent-error');

      broker.publish('agent-error', { session_id: 's1' });

      expect(errors).toHaveLength(1);
      expect(coordinator.getStats().errors).toBe(1);
    });
  });

  describe('escalation intake', () => {
    it('should republish an escalation request as an escalation-task', () => {
      const escalations = capture('escalation-task');
      sendMessage('s1', 'I need a person');

      broker.publish('escalation-request', {
        session_id: 's1',
        reason: 'CUSTOMER_REQUEST',
        details: { channel: 'chat' },
        priority: 'LOW',
        requesting_agent: 'returns-agent',
      });

      expect(escalations).toHaveLength(1);
      expect(escalations[0]?.payload).toMatchObject({
        session_id: 's1',
        reason: 'CUSTOMER_REQUEST',
        details: { channel: 'chat' },
        priority: 'LOW',
      });
      expect(coordinator.getStats().escalations).toBe(1);
    });

    it('should escalate an unknown session with a null snapshot', () => {
      const escalations = capture('escalation-task');

      broker.publish('escalation-request', { session_id: 'ghost', reason: 'CUSTOMER_REQUEST' });

      expect(escalations[0]?.payload).toMatchObject({ session_id: 'ghost', priority: 'NORMAL', snapshot: null });
    });

    it('should escalate on an agent error', () => {
      const escalations = capture('escalation-task');
      sendMessage('s1', 'hello');

      broker.publish('agent-error', {
        session_id: 's1',
        agent_name: 'returns-agent',
        error: 'inventory lookup failed',
        task: 'handle-returns',
      });

      expect(escalations[0]?.payload).toMatchObject({
        reason: 'AGENT_ERROR_returns-agent',
        details: { agent: 'returns-agent', error: 'inventory lookup failed', task: 'handle-returns' },
      });
      expect(coordinator.getStats().errors).toBe(1);
    });
  });

  describe('conversation lifecycle', () => {
    beforeEach(() => {
      sendMessage('s1', 'hello');
    });

    it('should record an agent reply and end the conversation when final', () => {
      const ends = capture('conversation-end');

      broker.publish('agent-response', { session_id: 's1', text: 'Your return label is on its way', agent: 'returns', final: true });

      const context = registry.get('s1');
      expect(context?.messages[1]).toMatchObject({
        sender: 'AGENT',
        text: 'Your return label is on its way',
        agentAction: { agent: 'returns', final: true },
      });
      expect(context?.status).toBe('RESOLVED');
      expect(ends.map((e) => e.payload)).toEqual([{ session_id: 's1', status: 'RESOLVED', reason: 'RESOLVED_BY_AGENT' }]);
    });

    it('should keep the conversation open on a non-final reply', () => {
      const ends = capture('conversation-end');

      broker.publish('agent-response', { session_id: 's1', text: 'Let me check' });

      expect(registry.get('s1')?.status).toBe('ACTIVE');
      expect(ends).toHaveLength(0);
    });

    it('should record the assigned operator', () => {
      broker.publish('operator-assigned', {
        assigned: true,
        operator_id: 'op-1',
        operator_name: 'Dana',
        session_id: 's1',
        reason: 'LOW_INTENT_CONFIDENCE',
        snapshot: null,
        enqueued_at: '2026-03-01T10:00:00.000Z',
        wait_seconds: 12,
      });

      expect(registry.get('s1')?.operatorId).toBe('op-1');
    });

    it('should end the conversation when an escalation closes', () => {
      const ends = capture('conversation-end');

      broker.publish('escalation-closed', {
        session_id: 's1',
        operator_id: 'op-1',
        handling_seconds: 60,
        total_seconds: 90,
      });

      expect(registry.get('s1')?.status).toBe('RESOLVED');
      expect(ends[0]?.payload).toEqual({
        session_id: 's1',
        status: 'RESOLVED',
        reason: 'RESOLVED_BY_OPERATOR',
        operator_id: 'op-1',
      });
    });

    it('should abandon the conversation on timeout', () => {
      const ends = capture('conversation-end');

      broker.publish('conversation-timeout', { session_id: 's1', idle_seconds: 900 });

      expect(registry.get('s1')?.status).toBe('ABANDONED');
      expect(ends[0]?.payload).toEqual({ session_id: 's1', status: 'ABANDONED', reason: 'TIMEOUT' });
    });
  });

  describe('end to end', () => {
    it('should route a return request with the full conversation', () => {
      broker.subscribe('sentiment-task', (event) => {
        broker.publish('sentiment-result', { session_id: event.payload.session_id, sentiment: 'NEUTRAL', confidence: 0.9 });
      });
      broker.subscribe('intent-task', (event) => {
        broker.publish('intent-result', { session_id: event.payload.session_id, intent: 'process_return', confidence: 0.95 });
      });
      const routed = capture('handle-returns');
      const escalations = capture('escalation-task');

      sendMessage('s1', 'I want to return my laptop');

      expect(routed).toHaveLength(1);
      expect(escalations).toHaveLength(0);
      expect(routed[0]?.payload).toMatchObject({
        session_id: 's1',
        current_sentiment: 'NEUTRAL',
        current_intent: 'process_return',
        messages: [{ sender: 'USER', text: 'I want to return my laptop' }],
      });
    });
  });

  describe('stop', () => {
    it('should unsubscribe every handler', () => {
      coordinator.stop();

      sendMessage('s1', 'hello');

      expect(registry.count()).toBe(0);
      expect(broker.getSubscriberCounts()).toEqual({});
    });
  });
});
