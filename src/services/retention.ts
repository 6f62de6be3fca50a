/**
 * Retention Job - deletes old inbox items nothing depends on anymore
 * Protected: items a task was created from, the newest summary's sources,
 * and the hot-turn window the context assembler reads.
 */

import { randomUUID } from 'crypto';
import type { InboxItem, MemorySummary, Task } from '../types/index.js';
import { CONFIG } from '../config.js';
import { DAY_MS, byRecency, toEpochMs } from '../utils/ordering.js';
import type { EntityStore } from './entity-store.js';

export interface CompactionOptions {
  retentionDays: number;
  hotTurnsLimit: number;
}

export interface CompactionSelection {
  cutoff: string;
  candidateIds: string[];
  protectedCounts: {
    referencedByTask: number;
    summaryProvenance: number;
    hotWindow: number;
  };
}

export interface CompactionReport extends CompactionSelection {
  scanned: number;
  deleted: number;
}

const DEFAULT_OPTIONS: CompactionOptions = {
  retentionDays: CONFIG.TRANSCRIPT_RETENTION_DAYS,
  hotTurnsLimit: CONFIG.MEMORY_HOT_TURNS_LIMIT
};

export function selectCompactionCandidates(
  items: InboxItem[],
  tasks: Task[],
  summaries: MemorySummary[],
  now: Date,
  options: CompactionOptions = DEFAULT_OPTIONS
): CompactionSelection {
  const cutoffMs = now.getTime() - options.retentionDays * DAY_MS;
  const referencedByTask = new Set(
    tasks.map(t => t.sourceInboxItemId).filter((id): id is string => typeof id === 'string')
  );

  // Newest summary and hot window per (user, chat)
  const chatKey = (userId: string, chatId: string) => `${userId}\u0000${chatId}`;
  const provenance = new Set<string>();
  const latestSummaries = new Map<string, MemorySummary>();
  for (const summary of [...summaries].sort(byRecency((s: MemorySummary) => s.createdAt))) {
    const key = chatKey(summary.userId, summary.chatId);
    if (!latestSummaries.has(key)) {
      latestSummaries.set(key, summary);
      summary.sourceIds.forEach(id => provenance.add(id));
    }
  }

  const hotWindow = new Set<string>();
  const perChat = new Map<string, number>();
  for (const item of [...items].sort(byRecency((i: InboxItem) => i.receivedAt))) {
    const key = chatKey(item.userId, item.chatId);
    const seen = perChat.get(key) ?? 0;
    if (seen < options.hotTurnsLimit) {
      hotWindow.add(item.id);
    }
    perChat.set(key, seen + 1);
  }

  const protectedCounts = { referencedByTask: 0, summaryProvenance: 0, hotWindow: 0 };
  const candidateIds: string[] = [];

  for (const item of items) {
    const receivedMs = toEpochMs(item.receivedAt);
    // Unparseable timestamps are never treated as old
    if (!Number.isFinite(receivedMs) || receivedMs >= cutoffMs) {
      continue;
    }
    if (referencedByTask.has(item.id)) {
      protectedCounts.referencedByTask++;
    } else if (provenance.has(item.id)) {
      protectedCounts.summaryProvenance++;
    } else if (hotWindow.has(item.id)) {
      protectedCounts.hotWindow++;
    } else {
      candidateIds.push(item.id);
    }
  }

  return {
    cutoff: new Date(cutoffMs).toISOString(),
    candidateIds: candidateIds.sort(),
    protectedCounts
  };
}

export class RetentionJob {
  constructor(
    private readonly store: EntityStore,
    private readonly options: CompactionOptions = DEFAULT_OPTIONS
  ) {}

  async run(now: Date = new Date()): Promise<CompactionReport> {
    const debug = process.env.DEBUG === 'true';
    const [items, tasks, summaries] = await Promise.all([
      this.store.getInboxItems(),
      this.store.getTasks(),
      this.store.getSummaries()
    ]);

    const selection = selectCompactionCandidates(items, tasks, summaries, now, this.options);
    const deleted = selection.candidateIds.length > 0
      ? await this.store.deleteInboxItems(selection.candidateIds)
      : 0;

    await this.store.appendEvent({
      id: randomUUID(),
      userId: null,
      eventType: 'memory_compacted',
      entityType: 'inbox_item',
      entityId: null,
      payload: { cutoff: selection.cutoff, deleted, protected: selection.protectedCounts },
      createdAt: now.toISOString()
    });

    if (debug) {
      console.log(`[INFO] Compaction: scanned ${items.length}, deleted ${deleted} (cutoff ${selection.cutoff})`);
    }

    return { ...selection, scanned: items.length, deleted };
  }
}
