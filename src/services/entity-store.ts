/**
 * Entity Store - read/delete access to captured messages and structured entities
 * The core only ever reads snapshots through this interface
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type {
  InboxItem,
  MemorySummary,
  Task,
  Goal,
  Problem,
  EntityLink,
  EventLogEntry
} from '../types/index.js';

export interface ChatScope {
  userId: string;
  chatId: string;
}

export interface EntityStore {
  getInboxItems(scope?: ChatScope): Promise<InboxItem[]>;
  getSummaries(scope?: ChatScope): Promise<MemorySummary[]>;
  getTasks(userId?: string): Promise<Task[]>;
  getGoals(userId: string): Promise<Goal[]>;
  getProblems(userId: string): Promise<Problem[]>;
  getLinks(userId: string): Promise<EntityLink[]>;
  deleteInboxItems(ids: string[]): Promise<number>;
  appendSummary(summary: MemorySummary): Promise<void>;
  appendEvent(event: EventLogEntry): Promise<void>;
}

const isoTimestamp = z.string().min(1);

const InboxItemSchema: z.ZodType<InboxItem, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  chatId: z.string().min(1),
  sessionId: z.string().nullable().default(null),
  source: z.string().default('api'),
  messageRaw: z.string(),
  messageNorm: z.string(),
  receivedAt: isoTimestamp
});

const MemorySummarySchema: z.ZodType<MemorySummary, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  chatId: z.string().min(1),
  sessionId: z.string().nullable().default(null),
  summaryType: z.enum(['session', 'daily', 'weekly']).default('session'),
  summaryText: z.string(),
  facts: z.array(z.string()).default([]),
  sourceIds: z.array(z.string()).default([]),
  createdAt: isoTimestamp
});

const TaskSchema: z.ZodType<Task, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  title: z.string(),
  titleNorm: z.string(),
  notes: z.string().nullable().optional(),
  status: z.enum(['open', 'blocked', 'done', 'archived']),
  priority: z.number().int().min(1).max(4).nullable().default(null),
  impactScore: z.number().int().min(1).max(5).nullable().default(null),
  dueDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable().default(null),
  estimatedMinutes: z.number().int().positive().nullable().optional(),
  sourceInboxItemId: z.string().nullable().default(null),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp
});

const GoalSchema: z.ZodType<Goal, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  title: z.string(),
  titleNorm: z.string(),
  status: z.enum(['active', 'paused', 'done', 'archived']),
  targetDate: z.string().nullable().default(null),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp
});

const ProblemSchema: z.ZodType<Problem, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  title: z.string(),
  titleNorm: z.string(),
  status: z.enum(['active', 'monitoring', 'resolved', 'archived']),
  severity: z.number().int().min(1).max(5).nullable().default(null),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp
});

const entityType = z.enum(['task', 'goal', 'problem']);

const EntityLinkSchema: z.ZodType<EntityLink, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  fromType: entityType,
  fromId: z.string().min(1),
  toType: entityType,
  toId: z.string().min(1),
  linkType: z.enum(['depends_on', 'blocks', 'supports_goal', 'related', 'addresses_problem']),
  createdAt: isoTimestamp
});

export interface EntitySnapshot {
  inboxItems: InboxItem[];
  summaries: MemorySummary[];
  tasks: Task[];
  goals: Goal[];
  problems: Problem[];
  links: EntityLink[];
  events: EventLogEntry[];
}

/**
 * Parse each record on its own; a malformed record is skipped, never fatal
 */
function parseRecords<T>(
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): T[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    console.warn(`Invalid entity snapshot: "${label}" must be an array, ignoring it`);
    return [];
  }

  const records: T[] = [];
  raw.forEach((entry, index) => {
    const result = schema.safeParse(entry);
    if (result.success) {
      records.push(result.data);
    } else {
      const issue = result.error.issues[0];
      console.warn(`Skipping invalid ${label} record #${index}: ${issue?.path.join('.') || 'record'} ${issue?.message ?? ''}`.trim());
    }
  });
  return records;
}

export function parseEntitySnapshot(raw: unknown): EntitySnapshot {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Entity snapshot must be a JSON object');
  }
  const data = new Map<string, unknown>(Object.entries(raw));

  return {
    inboxItems: parseRecords(data.get('inboxItems'), InboxItemSchema, 'inboxItems'),
    summaries: parseRecords(data.get('summaries'), MemorySummarySchema, 'summaries'),
    tasks: parseRecords(data.get('tasks'), TaskSchema, 'tasks'),
    goals: parseRecords(data.get('goals'), GoalSchema, 'goals'),
    problems: parseRecords(data.get('problems'), ProblemSchema, 'problems'),
    links: parseRecords(data.get('links'), EntityLinkSchema, 'links'),
    events: []
  };
}

export class InMemoryEntityStore implements EntityStore {
  private inboxItems: InboxItem[];
  private readonly summaries: MemorySummary[];
  private readonly tasks: Task[];
  private readonly goals: Goal[];
  private readonly problems: Problem[];
  private readonly links: EntityLink[];
  private readonly events: EventLogEntry[];

  constructor(snapshot: Partial<EntitySnapshot> = {}) {
    this.inboxItems = [...(snapshot.inboxItems ?? [])];
    this.summaries = [...(snapshot.summaries ?? [])];
    this.tasks = [...(snapshot.tasks ?? [])];
    this.goals = [...(snapshot.goals ?? [])];
    this.problems = [...(snapshot.problems ?? [])];
    this.links = [...(snapshot.links ?? [])];
    this.events = [...(snapshot.events ?? [])];
  }

  /**
   * Load a snapshot from a JSON file
   */
  static fromFile(dataPath: string): InMemoryEntityStore {
    try {
      const data = readFileSync(dataPath, 'utf-8');
      const store = new InMemoryEntityStore(parseEntitySnapshot(JSON.parse(data)));
      if (process.env.DEBUG === 'true') {
        console.log(`Loaded entity snapshot from ${dataPath}`);
      }
      return store;
    } catch (error) {
      throw new Error(`Failed to load entity snapshot: ${error instanceof Error ? error.message : error}`);
    }
  }

  async getInboxItems(scope?: ChatScope): Promise<InboxItem[]> {
    return this.inboxItems.filter(item => !scope || (item.userId === scope.userId && item.chatId === scope.chatId));
  }

  async getSummaries(scope?: ChatScope): Promise<MemorySummary[]> {
    return this.summaries.filter(s => !scope || (s.userId === scope.userId && s.chatId === scope.chatId));
  }

  async getTasks(userId?: string): Promise<Task[]> {
    return this.tasks.filter(t => userId === undefined || t.userId === userId);
  }

  async getGoals(userId: string): Promise<Goal[]> {
    return this.goals.filter(g => g.userId === userId);
  }

  async getProblems(userId: string): Promise<Problem[]> {
    return this.problems.filter(p => p.userId === userId);
  }

  async getLinks(userId: string): Promise<EntityLink[]> {
    return this.links.filter(l => l.userId === userId);
  }

  async deleteInboxItems(ids: string[]): Promise<number> {
    const doomed = new Set(ids);
    const before = this.inboxItems.length;
    this.inboxItems = this.inboxItems.filter(item => !doomed.has(item.id));
    return before - this.inboxItems.length;
  }

  async appendSummary(summary: MemorySummary): Promise<void> {
    this.summaries.push(summary);
  }

  async appendEvent(event: EventLogEntry): Promise<void> {
    this.events.push(event);
  }

  getEvents(): EventLogEntry[] {
    return [...this.events];
  }
}
