/**
 * Core type definitions for the assistant memory and planning core
 */

export type TaskStatus = 'open' | 'blocked' | 'done' | 'archived';
export type GoalStatus = 'active' | 'paused' | 'done' | 'archived';
export type ProblemStatus = 'active' | 'monitoring' | 'resolved' | 'archived';
export type EntityType = 'task' | 'goal' | 'problem';
export type LinkType = 'depends_on' | 'blocks' | 'supports_goal' | 'related' | 'addresses_problem';
export type SummaryType = 'session' | 'daily' | 'weekly';

export interface InboxItem {
  id: string;
  userId: string;
  chatId: string;
  sessionId: string | null;
  source: string;
  messageRaw: string;
  messageNorm: string;
  receivedAt: string; // ISO timestamp
}

export interface Task {
  id: string;
  userId: string;
  title: string;
  titleNorm: string;
  notes?: string | null;
  status: TaskStatus;
  priority: number | null; // 1 = highest
  impactScore: number | null; // 1..5
  dueDate: string | null; // YYYY-MM-DD
  estimatedMinutes?: number | null;
  sourceInboxItemId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Goal {
  id: string;
  userId: string;
  title: string;
  titleNorm: string;
  status: GoalStatus;
  targetDate: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Problem {
  id: string;
  userId: string;
  title: string;
  titleNorm: string;
  status: ProblemStatus;
  severity: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface EntityLink {
  id: string;
  userId: string;
  fromType: EntityType;
  fromId: string;
  toType: EntityType;
  toId: string;
  linkType: LinkType;
  createdAt: string;
}

export interface MemorySummary {
  id: string;
  userId: string;
  chatId: string;
  sessionId: string | null;
  summaryType: SummaryType;
  summaryText: string;
  facts: string[];
  sourceIds: string[]; // provenance
  createdAt: string;
}

export interface EventLogEntry {
  id: string;
  userId: string | null;
  eventType: string;
  entityType: string | null;
  entityId: string | null;
  payload: Record<string, unknown>;
  createdAt: string;
}

/**
 * Read snapshot handed to the context assembler. The caller fetches it;
 * the assembler never performs I/O.
 */
export interface MemorySnapshot {
  inboxItems: InboxItem[];
  summaries: MemorySummary[];
  tasks: Task[];
  goals: Goal[];
  problems: Problem[];
  links: EntityLink[];
}

// --- Context envelope ---

export type ContextLayerName = 'policy' | 'summary' | 'hot_turns' | 'related_entities' | 'query';

export interface ContextLayer {
  name: ContextLayerName;
  text: string;
}

export interface ContextProvenance {
  summary_id: string | null;
  summary_source_ids: string[];
  hot_turn_ids: string[];
  entity_refs: string[]; // "<type>:<id>"
}

export interface ContextEnvelope {
  budget: {
    requested: number;
    applied: number;
    estimated_used: number;
  };
  sources: {
    hot_turns_count: number;
    summaries_count: number;
    entities_count: number;
  };
  context: string[];
  metadata: {
    budget_truncated_core: boolean;
    token_estimator: string;
    layers: ContextLayerName[];
    trimmed: {
      hot_turns: number;
      related_entities: number;
      summary: boolean;
      query: boolean;
    };
    provenance: ContextProvenance;
  };
}

// --- Plan payload ---

export type PlanFactor =
  | 'overdue'
  | 'due_soon'
  | 'high_impact'
  | 'goal_alignment'
  | 'dependency_ready'
  | 'stale'
  | 'quick_win';

export interface PlanItem {
  task_id: string;
  rank: number;
  title: string;
  reason?: string;
  score?: number;
  estimated_minutes?: number;
}

export interface BlockedItem {
  task_id: string;
  title: string;
  blocked_by: string[];
}

export interface PlanRationale {
  task_id: string;
  factors: PlanFactor[];
}

export interface PlanPayload {
  schema_version: 'plan.v1';
  plan_window: 'today';
  generated_at: string;
  today_plan: PlanItem[];
  next_actions: PlanItem[];
  blocked_items: BlockedItem[];
  why_this_order?: PlanRationale[];
  assumptions?: string[];
  fallback?: true;
}

export type PlanValidation =
  | { valid: true; payload: PlanPayload }
  | { valid: false; reason: string };
