import { describe, it, expect } from 'vitest';
import { ContextManager } from '../src/services/context-manager.js';
import { buildInstructions, createAgent, queryText } from '../src/services/agent.js';
import { CHAT, USER, makeSnapshot, makeSummary } from './fixtures.js';

describe('Agent instructions', () => {
  const manager = new ContextManager({ ceilingTokens: 3000, hotTurnsLimit: 8, relatedEntitiesLimit: 2, policy: 'Policy.' });

  it('uses every layer but the query as instructions', () => {
    const snapshot = makeSnapshot({
      summaries: [makeSummary('s1', '2026-10-16T00:00:00Z', { summaryText: 'Rent is monthly.' })]
    });
    const envelope = manager.buildContext(snapshot, { userId: USER, chatId: CHAT, query: 'When is rent due?', maxTokens: 3000 });

    expect(envelope.metadata.layers).toEqual(['policy', 'summary', 'query']);
    expect(buildInstructions(envelope)).toBe('Policy.\n\nSummary: Rent is monthly.');
    expect(queryText(envelope)).toBe('Query: When is rent due?');
    expect(createAgent(envelope).instructions).toBe('Policy.\n\nSummary: Rent is monthly.');
  });

  it('keeps the clipped policy when the query layer was dropped', () => {
    const envelope = manager.buildContext(makeSnapshot(), { userId: USER, chatId: CHAT, query: 'q', maxTokens: 1 });

    expect(envelope.metadata.layers).toEqual(['policy']);
    expect(envelope.context).toEqual(['Pol']);
    expect(buildInstructions(envelope)).toBe('Pol');
    expect(queryText(envelope)).toBe('');
  });
});
