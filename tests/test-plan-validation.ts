import { describe, it, expect } from 'vitest';
import {
  checkRewritePreservesPlan,
  createFallbackPlan,
  validatePlanPayload
} from '../src/services/plan-validation.js';
import { PlanningEngine, createPlanningState } from '../src/services/planner.js';
import type { PlanItem, PlanPayload, PlanValidation } from '../src/types/index.js';
import { NOW, PLAN_OPTIONS, USER, makeTask } from './fixtures.js';

function baselinePlan(): PlanPayload {
  const state = createPlanningState(
    USER,
    [makeTask('a', { impactScore: 5 }), makeTask('b', { impactScore: 3 }), makeTask('c', { status: 'blocked' })],
    [],
    []
  );
  return new PlanningEngine(PLAN_OPTIONS).buildPlan(state, NOW);
}

function reasonOf(result: PlanValidation): string {
  return result.valid ? '' : result.reason;
}

function itemAt(items: PlanItem[], index: number): PlanItem {
  const item = items[index];
  if (!item) {
    throw new Error(`no plan item at ${index}`);
  }
  return item;
}

describe('validatePlanPayload', () => {
  it('accepts plans built by the engine', () => {
    const plan = baselinePlan();
    expect(validatePlanPayload(plan)).toEqual({ valid: true, payload: plan });
  });

  it('accepts the fallback plan', () => {
    const fallback = createFallbackPlan(NOW);
    expect(fallback).toEqual({
      schema_version: 'plan.v1',
      plan_window: 'today',
      generated_at: '2026-10-18T12:00:00.000Z',
      today_plan: [],
      next_actions: [],
      blocked_items: [],
      assumptions: [],
      fallback: true
    });
    expect(validatePlanPayload(fallback).valid).toBe(true);
  });

  it('rejects unknown top-level fields', () => {
    const result = validatePlanPayload({ ...baselinePlan(), extra: 1 });
    expect(result.valid).toBe(false);
    expect(reasonOf(result)).toContain("'extra'");
  });

  it('rejects another schema version', () => {
    const result = validatePlanPayload({ ...baselinePlan(), schema_version: 'plan.v2' });
    expect(reasonOf(result)).toMatch(/^schema_version: /);
  });

  it('rejects ranks out of sequence', () => {
    const plan = baselinePlan();
    const result = validatePlanPayload({
      ...plan,
      today_plan: [itemAt(plan.today_plan, 0), { ...itemAt(plan.today_plan, 1), rank: 3 }]
    });
    expect(reasonOf(result)).toBe('today_plan.1.rank: rank 3 at position 2 is out of sequence');
  });

  it('rejects a task listed twice', () => {
    const plan = baselinePlan();
    const result = validatePlanPayload({
      ...plan,
      blocked_items: [...plan.blocked_items, { task_id: 'a', title: 'Task a', blocked_by: ['status:blocked'] }]
    });
    expect(reasonOf(result)).toBe('task a appears more than once');
  });

  it('rejects blocked items without a reason', () => {
    const result = validatePlanPayload({
      ...baselinePlan(),
      blocked_items: [{ task_id: 'c', title: 'Task c', blocked_by: [] }]
    });
    expect(reasonOf(result)).toMatch(/^blocked_items\.0\.blocked_by: /);
  });

  it('rejects non-objects', () => {
    expect(validatePlanPayload(null).valid).toBe(false);
    expect(validatePlanPayload('plan').valid).toBe(false);
  });
});

describe('checkRewritePreservesPlan', () => {
  it('allows reworded reasons', () => {
    const plan = baselinePlan();
    const candidate: PlanPayload = {
      ...plan,
      today_plan: plan.today_plan.map(item => ({ ...item, reason: `Because ${item.task_id}` }))
    };
    expect(checkRewritePreservesPlan(plan, candidate)).toEqual({ valid: true, payload: candidate });
  });

  it('rejects reordering', () => {
    const plan = baselinePlan();
    const candidate: PlanPayload = {
      ...plan,
      today_plan: [
        { ...itemAt(plan.today_plan, 1), rank: 1 },
        { ...itemAt(plan.today_plan, 0), rank: 2 }
      ]
    };
    expect(checkRewritePreservesPlan(plan, candidate)).toEqual({
      valid: false,
      reason: 'rewrite changed fields other than reason'
    });
  });

  it('rejects changed titles', () => {
    const plan = baselinePlan();
    const candidate: PlanPayload = {
      ...plan,
      today_plan: [{ ...itemAt(plan.today_plan, 0), title: 'Renamed' }, itemAt(plan.today_plan, 1)]
    };
    expect(checkRewritePreservesPlan(plan, candidate).valid).toBe(false);
  });
});
