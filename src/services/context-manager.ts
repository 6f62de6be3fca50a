/**
 * Context Manager - layered context assembly under a hard token budget
 * Layers: policy → summary → hot turns → related entities → query
 * Trimming: hot turns (oldest first) → related entities (least relevant first)
 * → summary → query text
 */

import type {
  ContextEnvelope,
  ContextLayer,
  EntityType,
  InboxItem,
  MemorySnapshot,
  MemorySummary,
  Task
} from '../types/index.js';
import { TokenCounter } from '../utils/token-counter.js';
import type { TokenEstimator } from '../utils/token-counter.js';
import { byRecency } from '../utils/ordering.js';
import { CONFIG } from '../config.js';
import type { EntityStore } from './entity-store.js';

export const DEFAULT_POLICY = `You are a personal assistant keeping track of the user's tasks, goals and problems.
Answer from the context below. Prefer recent messages and entities that are linked to each other.`;

export const TRUNCATION_MARKER = '... [truncated]';
const QUERY_LABEL = 'Query: ';
const LAYER_SEPARATOR = '\n';

export interface ContextOptions {
  ceilingTokens: number;
  hotTurnsLimit: number;
  relatedEntitiesLimit: number;
  policy: string;
}

export interface ContextRequest {
  userId: string;
  chatId: string;
  query: string;
  maxTokens?: number | null;
}

interface RenderedRecord {
  ref: string;
  text: string;
}

interface ContextDraft {
  policy: string;
  summary: { id: string; sourceIds: string[]; text: string } | null;
  hotTurns: RenderedRecord[];
  entities: RenderedRecord[];
  query: string;
}

interface BudgetResult {
  draft: ContextDraft;
  layers: ContextLayer[];
  truncatedCore: boolean;
  trimmed: ContextEnvelope['metadata']['trimmed'];
}

interface EntityCandidate {
  type: EntityType;
  id: string;
  title: string;
  status: string;
  updatedAt: string;
}

/**
 * Fetch everything the assembler may need for one (user, chat).
 * buildContext itself performs no I/O.
 */
export async function collectMemorySnapshot(
  store: EntityStore,
  userId: string,
  chatId: string
): Promise<MemorySnapshot> {
  const scope = { userId, chatId };
  const [inboxItems, summaries, tasks, goals, problems, links] = await Promise.all([
    store.getInboxItems(scope),
    store.getSummaries(scope),
    store.getTasks(userId),
    store.getGoals(userId),
    store.getProblems(userId),
    store.getLinks(userId)
  ]);
  return { inboxItems, summaries, tasks, goals, problems, links };
}

export class ContextManager {
  private readonly options: ContextOptions;

  constructor(
    options: Partial<ContextOptions> = {},
    private readonly estimator: TokenEstimator = TokenCounter.heuristic
  ) {
    this.options = {
      ceilingTokens: CONFIG.MEMORY_CONTEXT_MAX_TOKENS,
      hotTurnsLimit: CONFIG.MEMORY_HOT_TURNS_LIMIT,
      relatedEntitiesLimit: CONFIG.MEMORY_RELATED_ENTITIES_LIMIT,
      policy: DEFAULT_POLICY,
      ...options
    };
  }

  /**
   * Build the context envelope for one request. Pure: reads only the snapshot.
   */
  buildContext(snapshot: MemorySnapshot, request: ContextRequest): ContextEnvelope {
    const requested = this.resolveRequestedBudget(request.maxTokens);
    const applied = Math.max(0, Math.min(requested, this.options.ceilingTokens));

    const draft: ContextDraft = {
      policy: this.options.policy,
      summary: this.selectSummary(snapshot, request),
      hotTurns: this.selectHotTurns(snapshot, request),
      entities: this.selectRelatedEntities(snapshot, request.userId),
      query: request.query ?? ''
    };

    const result = this.enforceBudget(draft, applied);
    const kept = result.draft;

    return {
      budget: {
        requested,
        applied,
        estimated_used: this.estimateLayers(result.layers)
      },
      sources: {
        hot_turns_count: kept.hotTurns.length,
        summaries_count: kept.summary ? 1 : 0,
        entities_count: kept.entities.length
      },
      context: result.layers.map(layer => layer.text),
      metadata: {
        budget_truncated_core: result.truncatedCore,
        token_estimator: this.estimator.mode,
        layers: result.layers.map(layer => layer.name),
        trimmed: result.trimmed,
        provenance: {
          summary_id: kept.summary?.id ?? null,
          summary_source_ids: kept.summary ? [...kept.summary.sourceIds] : [],
          hot_turn_ids: kept.hotTurns.map(turn => turn.ref),
          entity_refs: kept.entities.map(entity => entity.ref)
        }
      }
    };
  }

  private resolveRequestedBudget(maxTokens: number | null | undefined): number {
    if (maxTokens === null || maxTokens === undefined || !Number.isFinite(maxTokens)) {
      return this.options.ceilingTokens;
    }
    return Math.max(0, Math.floor(maxTokens));
  }

  /**
   * Most recent summary for (user, chat)
   */
  private selectSummary(snapshot: MemorySnapshot, request: ContextRequest): ContextDraft['summary'] {
    const latest: MemorySummary | undefined = snapshot.summaries
      .filter(s => s.userId === request.userId && s.chatId === request.chatId)
      .sort(byRecency((s: MemorySummary) => s.createdAt))[0];

    if (!latest) {
      return null;
    }
    return {
      id: latest.id,
      sourceIds: latest.sourceIds,
      text: `Summary: ${latest.summaryText}`
    };
  }

  /**
   * Newest N turns for (user, chat), rendered oldest first
   */
  private selectHotTurns(snapshot: MemorySnapshot, request: ContextRequest): RenderedRecord[] {
    const limit = Math.max(0, this.options.hotTurnsLimit);
    return snapshot.inboxItems
      .filter(item => item.userId === request.userId && item.chatId === request.chatId)
      .sort(byRecency((item: InboxItem) => item.receivedAt))
      .slice(0, limit)
      .reverse()
      .map(item => ({ ref: item.id, text: `${item.source}: ${item.messageNorm}` }));
  }

  /**
   * Link proximity first, recency second:
   * recent tasks, then goals/problems linked from them, then recent goals/problems.
   * Returned in relevance order (most relevant first).
   */
  private selectRelatedEntities(snapshot: MemorySnapshot, userId: string): RenderedRecord[] {
    const limit = Math.max(0, this.options.relatedEntitiesLimit);
    if (limit === 0) {
      return [];
    }

    const live = <T extends { userId: string; status: string }>(items: T[]) =>
      items.filter(item => item.userId === userId && item.status !== 'archived');

    const tasks = live(snapshot.tasks).sort(byRecency((t: Task) => t.updatedAt)).slice(0, Math.floor(limit / 2));
    const goals = live(snapshot.goals);
    const problems = live(snapshot.problems);

    const selected: EntityCandidate[] = tasks.map(t => ({
      type: 'task' as const, id: t.id, title: t.title, status: t.status, updatedAt: t.updatedAt
    }));
    const seen = new Set(selected.map(e => `${e.type}:${e.id}`));
    const goalsById = new Map(goals.map(g => [g.id, g]));
    const problemsById = new Map(problems.map(p => [p.id, p]));

    const add = (candidate: EntityCandidate): void => {
      const ref = `${candidate.type}:${candidate.id}`;
      if (selected.length < limit && !seen.has(ref)) {
        seen.add(ref);
        selected.push(candidate);
      }
    };

    // Goals and problems one hop away from the selected tasks, in task order
    for (const task of tasks) {
      for (const link of snapshot.links) {
        if (link.userId !== userId || link.fromType !== 'task' || link.fromId !== task.id) {
          continue;
        }
        const target = link.toType === 'goal'
          ? goalsById.get(link.toId)
          : link.toType === 'problem' ? problemsById.get(link.toId) : undefined;
        if (target && (link.toType === 'goal' || link.toType === 'problem')) {
          add({ type: link.toType, id: target.id, title: target.title, status: target.status, updatedAt: target.updatedAt });
        }
      }
    }

    // Fill what is left by recency alone
    const fill: EntityCandidate[] = [
      ...goals.map(g => ({ type: 'goal' as const, id: g.id, title: g.title, status: g.status, updatedAt: g.updatedAt })),
      ...problems.map(p => ({ type: 'problem' as const, id: p.id, title: p.title, status: p.status, updatedAt: p.updatedAt }))
    ].sort(byRecency((e: EntityCandidate) => e.updatedAt));
    for (const candidate of fill) {
      add(candidate);
    }

    return selected.map(e => ({
      ref: `${e.type}:${e.id}`,
      text: `${ENTITY_LABELS[e.type]} [${e.id}]: ${e.title} (Status: ${e.status})`
    }));
  }

  /**
   * Trim layers until the rendered context fits the applied budget
   */
  private enforceBudget(draft: ContextDraft, applied: number): BudgetResult {
    const current: ContextDraft = {
      ...draft,
      hotTurns: [...draft.hotTurns],
      entities: [...draft.entities]
    };
    const trimmed = { hot_turns: 0, related_entities: 0, summary: false, query: false };
    const over = (d: ContextDraft) => this.estimateLayers(renderLayers(d)) > applied;

    // Nothing but policy + query can help when those two alone overflow
    if (over({ ...current, summary: null, hotTurns: [], entities: [] })) {
      return this.truncateCore(current, applied, trimmed);
    }

    while (current.hotTurns.length > 0 && over(current)) {
      current.hotTurns.shift();
      trimmed.hot_turns++;
    }
    while (current.entities.length > 0 && over(current)) {
      current.entities.pop();
      trimmed.related_entities++;
    }
    if (current.summary && over(current)) {
      current.summary = null;
      trimmed.summary = true;
    }
    if (over(current)) {
      return this.truncateCore(current, applied, trimmed);
    }

    return { draft: current, layers: renderLayers(current), truncatedCore: false, trimmed };
  }

  /**
   * One-pass truncation derived from the estimator's character bound:
   * the rendered text is cut to at most maxCharsFor(applied) characters.
   */
  private truncateCore(
    current: ContextDraft,
    applied: number,
    trimmed: BudgetResult['trimmed']
  ): BudgetResult {
    const core: ContextDraft = { ...current, summary: null, hotTurns: [], entities: [] };
    trimmed.hot_turns += current.hotTurns.length;
    trimmed.related_entities += current.entities.length;
    trimmed.summary = trimmed.summary || current.summary !== null;
    trimmed.query = true;

    const maxChars = this.estimator.maxCharsFor(applied);
    const fixedChars = core.policy.length + LAYER_SEPARATOR.length + QUERY_LABEL.length + TRUNCATION_MARKER.length;
    const room = maxChars - fixedChars;

    if (room > 0) {
      core.query = sliceWhole(core.query, room) + TRUNCATION_MARKER;
      return { draft: core, layers: renderLayers(core), truncatedCore: true, trimmed };
    }

    // Budget smaller than the policy itself: keep the policy as a prefix
    core.query = '';
    return { draft: core, layers: clipLayers(renderLayers(core), maxChars), truncatedCore: true, trimmed };
  }

  private estimateLayers(layers: ContextLayer[]): number {
    return this.estimator.estimate(layers.map(layer => layer.text).join(LAYER_SEPARATOR));
  }
}

const ENTITY_LABELS: Record<EntityType, string> = {
  task: 'Task',
  goal: 'Goal',
  problem: 'Problem'
};

function renderLayers(draft: ContextDraft): ContextLayer[] {
  const layers: ContextLayer[] = [{ name: 'policy', text: draft.policy }];
  if (draft.summary) {
    layers.push({ name: 'summary', text: draft.summary.text });
  }
  if (draft.hotTurns.length > 0) {
    layers.push({ name: 'hot_turns', text: draft.hotTurns.map(t => t.text).join(LAYER_SEPARATOR) });
  }
  if (draft.entities.length > 0) {
    layers.push({ name: 'related_entities', text: draft.entities.map(e => e.text).join(LAYER_SEPARATOR) });
  }
  layers.push({ name: 'query', text: QUERY_LABEL + draft.query });
  return layers;
}

/**
 * Prefix of at most `end` code units that never ends inside a surrogate pair
 */
function sliceWhole(text: string, end: number): string {
  let cut = Math.min(end, text.length);
  if (cut > 0 && cut < text.length) {
    const last = text.charCodeAt(cut - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
      cut--;
    }
  }
  return text.slice(0, cut);
}

/**
 * Cut rendered layers to a character budget from the end, keeping order
 */
function clipLayers(layers: ContextLayer[], maxChars: number): ContextLayer[] {
  const clipped: ContextLayer[] = [];
  let remaining = maxChars;

  for (const layer of layers) {
    const joinCost = clipped.length === 0 ? 0 : LAYER_SEPARATOR.length;
    if (clipped.length > 0 && remaining - joinCost <= 0) {
      break;
    }
    const text = sliceWhole(layer.text, Math.max(0, remaining - joinCost));
    clipped.push({ name: layer.name, text });
    remaining -= joinCost + text.length;
    if (text.length < layer.text.length) {
      break;
    }
  }
  return clipped;
}

