/**
 * Planning Engine - deterministic, dependency-aware ranking of open tasks
 * Same (state, now) in, same payload out. No I/O, no logging.
 */

import type {
  BlockedItem,
  EntityLink,
  Goal,
  PlanFactor,
  PlanItem,
  PlanPayload,
  PlanRationale,
  Task
} from '../types/index.js';
import { CONFIG } from '../config.js';
import { DAY_MS, compareText, daysBetween, toCalendarDate, toEpochMs } from '../utils/ordering.js';
import type { EntityStore } from './entity-store.js';

export const PLAN_SCHEMA_VERSION = 'plan.v1';
export const EXPLICIT_BLOCK_REASON = 'status:blocked';

const LINK_TYPES = new Set(['depends_on', 'blocks', 'supports_goal', 'related', 'addresses_problem']);
const ENTITY_TYPES = new Set(['task', 'goal', 'problem']);

export interface PlanningState {
  userId: string;
  candidateTasks: Task[];
  taskLookup: Map<string, Task>;
  activeGoals: Goal[];
  links: EntityLink[];
}

export interface ScoringWeights {
  urgency: number;
  impact: number;
  goalAlignment: number;
  staleness: number;
  blockerPenalty: number;
  quickWin: number;
}

export interface ScoringThresholds {
  dueSoonDays: number;
  staleAfterDays: number;
  staleSaturationDays: number;
  quickWinPriority: number;
}

export interface PlanOptions {
  topNToday: number;
  topNNext: number;
  weights: ScoringWeights;
  thresholds: ScoringThresholds;
}

export interface TaskFeatures {
  goalAligned: boolean;
  dependencyReady: boolean;
  blocked: boolean;
}

export interface BlockDetection {
  readyIds: string[];
  blockedMap: Map<string, string[]>;
}

export interface ScoredTask {
  task: Task;
  score: number;
  factors: PlanFactor[];
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  urgency: CONFIG.PLAN_WEIGHT_URGENCY,
  impact: CONFIG.PLAN_WEIGHT_IMPACT,
  goalAlignment: CONFIG.PLAN_WEIGHT_GOAL_ALIGNMENT,
  staleness: CONFIG.PLAN_WEIGHT_STALENESS,
  blockerPenalty: CONFIG.PLAN_WEIGHT_BLOCKER_PENALTY,
  quickWin: CONFIG.PLAN_QUICK_WIN_BONUS
};

export const DEFAULT_THRESHOLDS: ScoringThresholds = {
  dueSoonDays: CONFIG.PLAN_DUE_SOON_DAYS,
  staleAfterDays: CONFIG.PLAN_STALE_AFTER_DAYS,
  staleSaturationDays: CONFIG.PLAN_STALE_SATURATION_DAYS,
  quickWinPriority: CONFIG.PLAN_QUICK_WIN_PRIORITY
};

const FACTOR_LABELS: Record<PlanFactor, string> = {
  overdue: 'overdue',
  due_soon: 'due soon',
  high_impact: 'high impact',
  goal_alignment: 'supports an active goal',
  dependency_ready: 'dependencies cleared',
  stale: 'untouched for a while',
  quick_win: 'quick win'
};

/**
 * Rows missing ids or carrying unknown enum values are dropped one by one
 */
export function isWellFormedLink(link: EntityLink): boolean {
  return Boolean(link)
    && typeof link.fromId === 'string' && link.fromId.length > 0
    && typeof link.toId === 'string' && link.toId.length > 0
    && ENTITY_TYPES.has(link.fromType)
    && ENTITY_TYPES.has(link.toType)
    && LINK_TYPES.has(link.linkType);
}

/**
 * Split loaded rows into ranking candidates (open) and the broader lookup
 * (every non-archived task) used to resolve dependencies.
 */
export function createPlanningState(
  userId: string,
  tasks: Task[],
  goals: Goal[],
  links: EntityLink[]
): PlanningState {
  const ownTasks = dedupeTasks(tasks.filter(t => t.userId === userId));
  return {
    userId,
    candidateTasks: ownTasks.filter(t => t.status === 'open'),
    taskLookup: new Map(ownTasks.filter(t => t.status !== 'archived').map(t => [t.id, t])),
    activeGoals: goals.filter(g => g.userId === userId && g.status === 'active'),
    links: links.filter(l => isWellFormedLink(l) && l.userId === userId)
  };
}

/**
 * One record per task id: the most recently updated wins, then the smaller
 * title, then the smaller serialized record, whatever the input order
 */
function dedupeTasks(tasks: Task[]): Task[] {
  const byId = new Map<string, Task>();
  for (const task of tasks) {
    const kept = byId.get(task.id);
    if (!kept || preferTask(task, kept)) {
      byId.set(task.id, task);
    }
  }
  const emitted = new Set<string>();
  return tasks.filter(task => {
    if (byId.get(task.id) !== task || emitted.has(task.id)) {
      return false;
    }
    emitted.add(task.id);
    return true;
  });
}

function preferTask(candidate: Task, kept: Task): boolean {
  const updatedCandidate = toEpochMs(candidate.updatedAt);
  const updatedKept = toEpochMs(kept.updatedAt);
  if (updatedCandidate !== updatedKept) {
    return updatedCandidate > updatedKept;
  }
  const byTitle = compareText(candidate.title, kept.title);
  if (byTitle !== 0) {
    return byTitle < 0;
  }
  return compareText(JSON.stringify(candidate), JSON.stringify(kept)) < 0;
}

export async function collectPlanningState(store: EntityStore, userId: string): Promise<PlanningState> {
  const [tasks, goals, links] = await Promise.all([
    store.getTasks(userId),
    store.getGoals(userId),
    store.getLinks(userId)
  ]);
  return createPlanningState(userId, tasks, goals, links);
}

export class PlanningEngine {
  private readonly options: PlanOptions;

  constructor(options: Partial<PlanOptions> = {}) {
    this.options = {
      topNToday: CONFIG.PLAN_TOP_N_TODAY,
      topNNext: CONFIG.PLAN_TOP_N_NEXT,
      ...options,
      weights: { ...DEFAULT_WEIGHTS, ...options.weights },
      thresholds: { ...DEFAULT_THRESHOLDS, ...options.thresholds }
    };
  }

  /**
   * Classify tasks as ready or blocked from persisted status only.
   * Each task is checked once against its direct edges, so cycles and
   * self-references simply leave their members blocked.
   */
  detectBlockedTasks(
    candidateTasks: Task[],
    taskLookup: Map<string, Task>,
    links: EntityLink[]
  ): BlockDetection {
    const evaluated = new Map<string, Task>();
    for (const task of candidateTasks) {
      evaluated.set(task.id, task);
    }
    for (const task of taskLookup.values()) {
      if (task.status === 'blocked') {
        evaluated.set(task.id, task);
      }
    }

    const unfinished = (id: string) => taskLookup.get(id)?.status !== 'done';
    const blockers = new Map<string, Set<string>>();
    const addBlocker = (taskId: string, blockerId: string) => {
      const set = blockers.get(taskId) ?? new Set<string>();
      set.add(blockerId);
      blockers.set(taskId, set);
    };

    for (const link of links) {
      if (!isWellFormedLink(link) || link.fromType !== 'task' || link.toType !== 'task') {
        continue;
      }
      if (link.linkType === 'depends_on' && evaluated.has(link.fromId) && unfinished(link.toId)) {
        addBlocker(link.fromId, link.toId);
      }
      if (link.linkType === 'blocks' && evaluated.has(link.toId) && unfinished(link.fromId)) {
        addBlocker(link.toId, link.fromId);
      }
    }

    const readyIds: string[] = [];
    const blockedMap = new Map<string, string[]>();
    const ids = [...evaluated.keys()].sort(compareText);

    for (const id of ids) {
      const task = evaluated.get(id);
      if (!task) continue;

      const reasons: string[] = [];
      if (task.status === 'blocked') {
        reasons.push(EXPLICIT_BLOCK_REASON);
      }
      reasons.push(...[...(blockers.get(id) ?? [])].sort(compareText));

      if (reasons.length > 0) {
        blockedMap.set(id, reasons);
      } else if (task.status === 'open') {
        readyIds.push(id);
      }
    }

    return { readyIds, blockedMap };
  }

  /**
   * Per-task features derived once per plan
   */
  deriveFeatures(state: PlanningState, blockedMap: Map<string, string[]>): Map<string, TaskFeatures> {
    const activeGoalIds = new Set(state.activeGoals.map(g => g.id));
    const aligned = new Set<string>();
    const withDependencies = new Set<string>();

    for (const link of state.links) {
      if (link.fromType === 'task' && link.toType === 'goal' && activeGoalIds.has(link.toId)) {
        aligned.add(link.fromId);
      }
      if (link.fromType === 'task' && link.toType === 'task') {
        if (link.linkType === 'depends_on') withDependencies.add(link.fromId);
        if (link.linkType === 'blocks') withDependencies.add(link.toId);
      }
    }

    const features = new Map<string, TaskFeatures>();
    for (const task of state.candidateTasks) {
      const blocked = blockedMap.has(task.id);
      features.set(task.id, {
        goalAligned: aligned.has(task.id),
        dependencyReady: withDependencies.has(task.id) && !blocked,
        blocked
      });
    }
    return features;
  }

  /**
   * Weighted score plus the factors that explain it.
   * Factors feed rationale only; ranking uses the score.
   */
  scoreTask(
    task: Task,
    features: TaskFeatures,
    weights: ScoringWeights,
    now: Date,
    thresholds: ScoringThresholds = this.options.thresholds
  ): { score: number; factors: PlanFactor[] } {
    let score = 0;
    const factors: PlanFactor[] = [];

    // 1. Urgency
    if (task.dueDate) {
      const daysLeft = daysBetween(toCalendarDate(now), task.dueDate);
      if (daysLeft !== null && daysLeft < 0) {
        score += weights.urgency * 2;
        factors.push('overdue');
      } else if (daysLeft !== null && daysLeft <= thresholds.dueSoonDays) {
        score += weights.urgency;
        factors.push('due_soon');
      }
    }

    // 2. Impact
    if (task.impactScore) {
      score += (task.impactScore / 5) * weights.impact;
      if (task.impactScore >= 4) {
        factors.push('high_impact');
      }
    }

    // 3. Goal alignment
    if (features.goalAligned) {
      score += weights.goalAlignment;
      factors.push('goal_alignment');
    }

    if (features.dependencyReady) {
      factors.push('dependency_ready');
    }

    // 4. Staleness (anti-starvation)
    const updatedMs = toEpochMs(task.updatedAt);
    const daysStale = Number.isFinite(updatedMs) ? Math.floor((now.getTime() - updatedMs) / DAY_MS) : 0;
    if (daysStale > thresholds.staleAfterDays) {
      score += Math.min(daysStale / thresholds.staleSaturationDays, 1) * weights.staleness;
      factors.push('stale');
    }

    // 5. Quick win
    if (task.priority === thresholds.quickWinPriority) {
      score += weights.quickWin;
      factors.push('quick_win');
    }

    // Bookkeeping only: blocked tasks never reach ranking
    if (features.blocked) {
      score -= weights.blockerPenalty;
    }

    return { score: Math.round(score * 10000) / 10000, factors };
  }

  /**
   * Total order: score desc, due date asc (nulls last), priority asc (nulls last),
   * updated_at asc, task id asc
   */
  rankCandidates(scored: ScoredTask[]): ScoredTask[] {
    return [...scored].sort((a, b) => {
      if (a.score !== b.score) return b.score - a.score;

      const dueA = a.task.dueDate ?? '9999-12-31';
      const dueB = b.task.dueDate ?? '9999-12-31';
      if (dueA !== dueB) return compareText(dueA, dueB);

      const prioA = a.task.priority ?? 99;
      const prioB = b.task.priority ?? 99;
      if (prioA !== prioB) return prioA - prioB;

      const updA = toEpochMs(a.task.updatedAt);
      const updB = toEpochMs(b.task.updatedAt);
      if (updA !== updB) return updA < updB ? -1 : 1;

      return compareText(a.task.id, b.task.id);
    });
  }

  buildPlan(state: PlanningState, now: Date): PlanPayload {
    const { readyIds, blockedMap } = this.detectBlockedTasks(state.candidateTasks, state.taskLookup, state.links);
    const features = this.deriveFeatures(state, blockedMap);
    const ready = new Set(readyIds);

    const scored: ScoredTask[] = [];
    for (const task of state.candidateTasks) {
      const taskFeatures = features.get(task.id);
      if (!ready.has(task.id) || !taskFeatures) continue;
      const { score, factors } = this.scoreTask(task, taskFeatures, this.options.weights, now);
      scored.push({ task, score, factors });
    }

    const ranked = this.rankCandidates(scored);
    const todayCount = Math.max(0, this.options.topNToday);
    const nextCount = Math.max(0, this.options.topNNext);

    const today = ranked.slice(0, todayCount);
    const next = ranked.slice(todayCount, todayCount + nextCount);

    const whyThisOrder: PlanRationale[] = today.map(st => ({
      task_id: st.task.id,
      factors: st.factors.length > 0 ? st.factors : ['dependency_ready']
    }));

    const blockedItems: BlockedItem[] = [];
    for (const [taskId, reasons] of blockedMap) {
      const task = state.taskLookup.get(taskId);
      if (task) {
        blockedItems.push({ task_id: taskId, title: task.title, blocked_by: reasons });
      }
    }
    blockedItems.sort((a, b) => compareText(a.task_id, b.task_id));

    return {
      schema_version: PLAN_SCHEMA_VERSION,
      plan_window: 'today',
      generated_at: now.toISOString(),
      today_plan: today.map((st, idx) => toPlanItem(st, idx + 1)),
      next_actions: next.map((st, idx) => toPlanItem(st, todayCount + idx + 1)),
      blocked_items: blockedItems,
      why_this_order: whyThisOrder,
      assumptions: []
    };
  }
}

export function describeFactors(factors: PlanFactor[]): string {
  if (factors.length === 0) {
    return 'Ready to start';
  }
  const text = factors.map(f => FACTOR_LABELS[f]).join(', ');
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function toPlanItem(st: ScoredTask, rank: number): PlanItem {
  const item: PlanItem = {
    task_id: st.task.id,
    rank,
    title: st.task.title,
    reason: describeFactors(st.factors),
    score: st.score
  };
  const minutes = st.task.estimatedMinutes;
  if (typeof minutes === 'number' && Number.isInteger(minutes) && minutes > 0) {
    item.estimated_minutes = minutes;
  }
  return item;
}
