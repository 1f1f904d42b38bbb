/**
 * Simulate Command Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { runSimulation, summarizePayload } from './simulate.js';
import { getDefaultConfig } from '../../config/index.js';

describe('runSimulation', () => {
  it('should route and resolve a recognised request', async () => {
    const result = await runSimulation([{ sessionId: 'sim-1', text: 'I need a refund' }], {
      config: getDefaultConfig(),
      resolve: true,
    });

    expect(result.events.map((line) => line.type)).toEqual([
      'new-message',
      'sentiment-task',
      'sentiment-result',
      'intent-task',
      'intent-result',
      'handle-returns',
      'agent-response',
      'conversation-end',
      'transcript-saved',
    ]);
    expect(result.transcripts).toHaveLength(1);
    expect(result.transcripts[0]).toMatchObject({ session_id: 'sim-1', end_reason: 'RESOLVED_BY_AGENT' });
    expect(result.stats.registry.sessionsActive).toBe(0);
  });

  it('should leave a routed session open without auto replies', async () => {
    const result = await runSimulation([{ sessionId: 'sim-2', text: 'where is my parcel' }], {
      config: getDefaultConfig(),
    });

    expect(result.events.at(-1)?.type).toBe('handle-order-tracking');
    expect(result.transcripts).toHaveLength(0);
  });

  it('should hand escalations to the given operator', async () => {
    const result = await runSimulation([{ sessionId: 'sim-3', text: 'This is unacceptable' }], {
      config: getDefaultConfig(),
      operator: 'op-1',
    });

    expect(result.events.map((line) => line.type)).toEqual([
      'new-message',
      'sentiment-task',
      'sentiment-result',
      'escalation-task',
      'escalation-queued',
      'operator-notification',
      'operator-available',
      'operator-assigned',
      'escalation-resolved',
      'escalation-closed',
      'conversation-end',
      'transcript-saved',
    ]);
    expect(result.transcripts[0]).toMatchObject({
      session_id: 'sim-3',
      end_reason: 'RESOLVED_BY_OPERATOR',
      operator_id: 'op-1',
    });
  });
});

describe('summarizePayload', () => {
  it('should drop the session id and shorten long values', () => {
    const summary = summarizePayload({
      session_id: 's1',
      text: 'x'.repeat(80),
      confidence: 0.5,
    });

    expect(summary).toBe(`text=${'x'.repeat(57)}... confidence=0.5`);
  });
});
