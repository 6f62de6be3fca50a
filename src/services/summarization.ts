/**
 * Summarization Service - condenses recent chat turns into a MemorySummary
 * The summary keeps the ids of the turns it covers, which compaction protects.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { InboxItem, MemorySummary } from '../types/index.js';
import { CONFIG } from '../config.js';
import { byRecency } from '../utils/ordering.js';
import type { EntityStore } from './entity-store.js';
import type { TextGenerator } from './text-generator.js';

export const FALLBACK_SUMMARY_TEXT = 'No summary available.';
const MAX_FACTS = 20;

const SummaryResponseSchema = z.object({
  summary_text: z.string().trim().min(1),
  facts: z.array(z.union([z.string(), z.number(), z.boolean()])).default([])
});

const SYSTEM_PROMPT = `You summarize a personal assistant conversation for long-term memory.

Return a single JSON object:
{"summary_text": "2-4 sentences covering decisions, commitments and open questions", "facts": ["short durable fact", ...]}

Only include facts stated in the messages.`;

export interface SummarizationOptions {
  windowSize?: number;
}

interface SummaryDraft {
  text: string;
  facts: string[];
  fallback: boolean;
}

export class SummarizationService {
  private readonly windowSize: number;

  constructor(
    private readonly store: EntityStore,
    private readonly generator: TextGenerator,
    options: SummarizationOptions = {}
  ) {
    this.windowSize = options.windowSize ?? CONFIG.MEMORY_SUMMARY_WINDOW;
  }

  /**
   * Summarize the newest turns of a chat and store the result.
   * Returns null when the chat has no turns.
   */
  async summarize(userId: string, chatId: string, now: Date = new Date()): Promise<MemorySummary | null> {
    const items = (await this.store.getInboxItems({ userId, chatId }))
      .sort(byRecency((item: InboxItem) => item.receivedAt))
      .slice(0, Math.max(0, this.windowSize))
      .reverse();

    if (items.length === 0) {
      return null;
    }

    const draft = await this.draftSummary(renderTurns(items));
    const summary: MemorySummary = {
      id: `sum_${randomUUID().replace(/-/g, '').slice(0, 12)}`,
      userId,
      chatId,
      sessionId: items[items.length - 1]?.sessionId ?? null,
      summaryType: 'session',
      summaryText: draft.text,
      facts: draft.facts,
      sourceIds: items.map(item => item.id),
      createdAt: now.toISOString()
    };

    await this.store.appendSummary(summary);
    await this.store.appendEvent({
      id: randomUUID(),
      userId,
      eventType: 'memory_summary_created',
      entityType: 'memory_summary',
      entityId: summary.id,
      payload: { source_count: items.length, fallback: draft.fallback },
      createdAt: now.toISOString()
    });

    if (process.env.DEBUG === 'true') {
      console.log(`[INFO] Summary ${summary.id} created from ${items.length} turns for ${userId}/${chatId}`);
    }
    return summary;
  }

  private async draftSummary(conversation: string): Promise<SummaryDraft> {
    let raw: unknown;
    try {
      raw = JSON.parse(await this.generator.generate(SYSTEM_PROMPT, conversation));
    } catch (error) {
      console.error('Summarization failed:', error);
      return { text: FALLBACK_SUMMARY_TEXT, facts: [], fallback: true };
    }

    const parsed = SummaryResponseSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`Summary response rejected: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      return { text: FALLBACK_SUMMARY_TEXT, facts: [], fallback: true };
    }
    return {
      text: parsed.data.summary_text,
      facts: parsed.data.facts.map(fact => String(fact)).slice(0, MAX_FACTS),
      fallback: false
    };
  }
}

function renderTurns(items: InboxItem[]): string {
  return items.map(item => `${item.source}: ${item.messageRaw}`).join('\n');
}
