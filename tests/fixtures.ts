/**
 * Record builders shared by the test suites
 */

import type {
  EntityLink,
  Goal,
  InboxItem,
  MemorySnapshot,
  MemorySummary,
  Problem,
  Task
} from '../src/types/index.js';
import type { PlanOptions } from '../src/services/planner.js';

export const USER = 'user_1';
export const CHAT = 'chat_1';

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    userId: USER,
    title: `Task ${id}`,
    titleNorm: `task ${id}`,
    status: 'open',
    priority: null,
    impactScore: null,
    dueDate: null,
    sourceInboxItemId: null,
    createdAt: '2026-10-18T00:00:00Z',
    updatedAt: '2026-10-18T00:00:00Z',
    ...overrides
  };
}

export function makeGoal(id: string, overrides: Partial<Goal> = {}): Goal {
  return {
    id,
    userId: USER,
    title: `Goal ${id}`,
    titleNorm: `goal ${id}`,
    status: 'active',
    targetDate: null,
    createdAt: '2026-10-01T00:00:00Z',
    updatedAt: '2026-10-01T00:00:00Z',
    ...overrides
  };
}

export function makeProblem(id: string, overrides: Partial<Problem> = {}): Problem {
  return {
    id,
    userId: USER,
    title: `Problem ${id}`,
    titleNorm: `problem ${id}`,
    status: 'active',
    severity: null,
    createdAt: '2026-10-01T00:00:00Z',
    updatedAt: '2026-10-01T00:00:00Z',
    ...overrides
  };
}

export function makeLink(
  fromId: string,
  linkType: EntityLink['linkType'],
  toId: string,
  overrides: Partial<EntityLink> = {}
): EntityLink {
  return {
    id: `lnk_${fromId}_${linkType}_${toId}`,
    userId: USER,
    fromType: 'task',
    fromId,
    toType: 'task',
    toId,
    linkType,
    createdAt: '2026-10-01T00:00:00Z',
    ...overrides
  };
}

export function makeInboxItem(id: string, receivedAt: string, overrides: Partial<InboxItem> = {}): InboxItem {
  return {
    id,
    userId: USER,
    chatId: CHAT,
    sessionId: null,
    source: 'telegram',
    messageRaw: `message ${id}`,
    messageNorm: `message ${id}`,
    receivedAt,
    ...overrides
  };
}

export function makeSummary(id: string, createdAt: string, overrides: Partial<MemorySummary> = {}): MemorySummary {
  return {
    id,
    userId: USER,
    chatId: CHAT,
    sessionId: null,
    summaryType: 'daily',
    summaryText: `summary ${id}`,
    facts: [],
    sourceIds: [],
    createdAt,
    ...overrides
  };
}

export function makeSnapshot(overrides: Partial<MemorySnapshot> = {}): MemorySnapshot {
  return {
    inboxItems: [],
    summaries: [],
    tasks: [],
    goals: [],
    problems: [],
    links: [],
    ...overrides
  };
}

export const PLAN_OPTIONS: PlanOptions = {
  topNToday: 6,
  topNNext: 8,
  weights: {
    urgency: 4,
    impact: 3,
    goalAlignment: 2,
    staleness: 1,
    blockerPenalty: 6,
    quickWin: 0.5
  },
  thresholds: {
    dueSoonDays: 2,
    staleAfterDays: 7,
    staleSaturationDays: 30,
    quickWinPriority: 4
  }
};

export const NOW = new Date('2026-10-18T12:00:00Z');
