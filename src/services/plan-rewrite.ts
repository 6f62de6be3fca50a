/**
 * Plan Rewrite Service - lets an LLM reword the `reason` of plan items
 * Output is merged into the deterministic plan and re-validated; ids, ranks
 * and ordering always come from the planner.
 */

import { z } from 'zod';
import type { PlanItem, PlanPayload, PlanValidation } from '../types/index.js';
import { checkRewritePreservesPlan, validatePlanPayload } from './plan-validation.js';
import type { TextGenerator } from './text-generator.js';

// Partial answers: only task ids and reasons are read
const ReasonListSchema = z.object({
  today_plan: z.array(z.object({ task_id: z.string(), reason: z.string().min(1) }).passthrough()).optional(),
  next_actions: z.array(z.object({ task_id: z.string(), reason: z.string().min(1) }).passthrough()).optional()
}).passthrough();

const SYSTEM_PROMPT = `You rewrite the "reason" fields of a daily plan so they read naturally.

RULES:
1. Change only "reason" strings. Keep every other field exactly as given.
2. Do not add, remove or reorder items.
3. Keep each reason under 120 characters.
4. Return the full plan as a single JSON object.`;

export class PlanRewriteService {
  constructor(private readonly generator: TextGenerator) {}

  /**
   * Ask the model for better reasons. Any failure or structural change
   * yields an invalid result and the caller keeps the baseline.
   */
  async rewrite(baseline: PlanPayload): Promise<PlanValidation> {
    let raw: unknown;
    try {
      const text = await this.generator.generate(SYSTEM_PROMPT, JSON.stringify(baseline));
      raw = JSON.parse(text);
    } catch (error) {
      console.error('Plan rewrite failed:', error);
      return { valid: false, reason: `rewrite_failed: ${error instanceof Error ? error.message : String(error)}` };
    }

    return mergeRewrittenReasons(baseline, raw);
  }
}

/**
 * Accepts either a full plan or a partial {today_plan, next_actions} reason list
 */
export function mergeRewrittenReasons(baseline: PlanPayload, raw: unknown): PlanValidation {
  const full = validatePlanPayload(raw);
  if (full.valid) {
    return checkRewritePreservesPlan(baseline, full.payload);
  }

  const partial = ReasonListSchema.safeParse(raw);
  if (!partial.success || (!partial.data.today_plan && !partial.data.next_actions)) {
    return { valid: false, reason: `rewrite returned an unusable payload (${full.reason})` };
  }

  const reasons = new Map<string, string>();
  for (const item of [...(partial.data.today_plan ?? []), ...(partial.data.next_actions ?? [])]) {
    reasons.set(item.task_id, item.reason.trim());
  }

  const apply = (items: PlanItem[]): PlanItem[] =>
    items.map(item => {
      const reason = reasons.get(item.task_id);
      return reason ? { ...item, reason } : { ...item };
    });

  const merged: PlanPayload = {
    ...baseline,
    today_plan: apply(baseline.today_plan),
    next_actions: apply(baseline.next_actions)
  };

  const checked = validatePlanPayload(merged);
  return checked.valid ? checkRewritePreservesPlan(baseline, checked.payload) : checked;
}
