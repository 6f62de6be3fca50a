/**
 * Plan contract - schema check for every plan before it is returned or cached
 */

import { z } from 'zod';
import type { PlanPayload, PlanValidation } from '../types/index.js';
import { PLAN_SCHEMA_VERSION } from './planner.js';

const PlanItemSchema = z.object({
  task_id: z.string().min(1),
  rank: z.number().int().positive(),
  title: z.string(),
  reason: z.string().optional(),
  score: z.number().finite().optional(),
  estimated_minutes: z.number().int().positive().optional()
}).strict();

const BlockedItemSchema = z.object({
  task_id: z.string().min(1),
  title: z.string(),
  blocked_by: z.array(z.string().min(1)).min(1)
}).strict();

const PlanFactorSchema = z.enum([
  'overdue',
  'due_soon',
  'high_impact',
  'goal_alignment',
  'dependency_ready',
  'stale',
  'quick_win'
]);

const PlanPayloadSchema: z.ZodType<PlanPayload> = z.object({
  schema_version: z.literal(PLAN_SCHEMA_VERSION),
  plan_window: z.literal('today'),
  generated_at: z.string().datetime(),
  today_plan: z.array(PlanItemSchema),
  next_actions: z.array(PlanItemSchema),
  blocked_items: z.array(BlockedItemSchema),
  why_this_order: z.array(z.object({
    task_id: z.string().min(1),
    factors: z.array(PlanFactorSchema)
  }).strict()).optional(),
  assumptions: z.array(z.string()).optional(),
  fallback: z.literal(true).optional()
}).strict().superRefine((plan, ctx) => {
  const ranked = [...plan.today_plan, ...plan.next_actions];
  ranked.forEach((item, idx) => {
    if (item.rank !== idx + 1) {
      const inToday = idx < plan.today_plan.length;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `rank ${item.rank} at position ${idx + 1} is out of sequence`,
        path: inToday ? ['today_plan', idx, 'rank'] : ['next_actions', idx - plan.today_plan.length, 'rank']
      });
    }
  });

  const ids = new Set<string>();
  for (const item of [...ranked, ...plan.blocked_items]) {
    if (ids.has(item.task_id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `task ${item.task_id} appears more than once`
      });
    }
    ids.add(item.task_id);
  }
});

export function validatePlanPayload(raw: unknown): PlanValidation {
  const result = PlanPayloadSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, payload: result.data };
  }
  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { valid: false, reason: `${where}${issue?.message ?? 'invalid plan payload'}` };
}

/**
 * Fixed payload substituted when a plan fails its contract check
 */
export function createFallbackPlan(now: Date): PlanPayload {
  return {
    schema_version: PLAN_SCHEMA_VERSION,
    plan_window: 'today',
    generated_at: now.toISOString(),
    today_plan: [],
    next_actions: [],
    blocked_items: [],
    assumptions: [],
    fallback: true
  };
}

/**
 * A rewrite may only touch `reason` strings; everything else must match the baseline
 */
export function checkRewritePreservesPlan(baseline: PlanPayload, candidate: PlanPayload): PlanValidation {
  const withoutReasons = (plan: PlanPayload) => canonicalJson({
    ...plan,
    today_plan: plan.today_plan.map(({ reason: _reason, ...rest }) => rest),
    next_actions: plan.next_actions.map(({ reason: _reason, ...rest }) => rest)
  });

  if (withoutReasons(baseline) !== withoutReasons(candidate)) {
    return { valid: false, reason: 'rewrite changed fields other than reason' };
  }
  return { valid: true, payload: candidate };
}

/**
 * JSON with object keys sorted at every level
 */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
