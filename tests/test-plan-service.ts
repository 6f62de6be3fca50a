import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { PlanService } from '../src/services/plan-service.js';
import { PlanningEngine } from '../src/services/planner.js';
import type { PlanningState } from '../src/services/planner.js';
import { PlanRewriteService } from '../src/services/plan-rewrite.js';
import type { TextGenerator } from '../src/services/text-generator.js';
import { createFallbackPlan } from '../src/services/plan-validation.js';
import { InMemoryEntityStore } from '../src/services/entity-store.js';
import type { EntitySnapshot } from '../src/services/entity-store.js';
import type { PlanPayload, Task } from '../src/types/index.js';
import { CHAT, NOW, PLAN_OPTIONS, USER, makeTask } from './fixtures.js';

class CountingStore extends InMemoryEntityStore {
  taskReads = 0;
  active = 0;
  maxActive = 0;

  constructor(snapshot: Partial<EntitySnapshot>, private readonly delayMs = 0) {
    super(snapshot);
  }

  async getTasks(userId?: string): Promise<Task[]> {
    this.taskReads++;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise(resolve => setTimeout(resolve, this.delayMs));
    this.active--;
    return super.getTasks(userId);
  }
}

class StaticGenerator implements TextGenerator {
  constructor(private readonly reply: string) {}

  async generate(): Promise<string> {
    return this.reply;
  }
}

class MisnumberingEngine extends PlanningEngine {
  buildPlan(state: PlanningState, now: Date): PlanPayload {
    const plan = super.buildPlan(state, now);
    return { ...plan, today_plan: plan.today_plan.map(item => ({ ...item, rank: 7 })) };
  }
}

const TASKS = [makeTask('a', { impactScore: 5 }), makeTask('b', { impactScore: 3 })];
const later = (seconds: number) => new Date(NOW.getTime() + seconds * 1000);

describe('PlanService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keys the cache per user and chat', () => {
    expect(PlanService.cacheKey('user_1', 'chat_1')).toBe('plan:today:user_1:chat_1');
  });

  it('serves a cached plan until the TTL expires', async () => {
    const store = new CountingStore({ tasks: TASKS });
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS), cacheTtlSeconds: 60 });

    const first = await service.getTodayPlan(USER, CHAT, NOW);
    const cached = await service.getTodayPlan(USER, CHAT, later(30));
    expect(store.taskReads).toBe(1);
    expect(cached.generated_at).toBe(first.generated_at);

    const expired = await service.getTodayPlan(USER, CHAT, later(61));
    expect(store.taskReads).toBe(2);
    expect(expired.generated_at).toBe('2026-10-18T12:01:01.000Z');
  });

  it('evicts expired plans of other chats', async () => {
    const store = new CountingStore({ tasks: TASKS });
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS), cacheTtlSeconds: 60 });

    await service.getTodayPlan(USER, 'chat_a', NOW);
    await service.getTodayPlan(USER, 'chat_b', later(30));
    expect(service.cacheSize).toBe(2);

    await service.getTodayPlan(USER, 'chat_c', later(61));
    expect(service.cacheSize).toBe(2);

    await service.getTodayPlan(USER, 'chat_c', later(125));
    expect(service.cacheSize).toBe(1);
  });

  it('always recomputes on refresh', async () => {
    const store = new CountingStore({ tasks: TASKS });
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS), cacheTtlSeconds: 60 });

    await service.getTodayPlan(USER, CHAT, NOW);
    await service.refreshPlan(USER, CHAT, NOW);
    expect(store.taskReads).toBe(2);
  });

  it('applies an accepted rewrite', async () => {
    const store = new CountingStore({ tasks: TASKS });
    const rewriter = new PlanRewriteService(new StaticGenerator(JSON.stringify({
      today_plan: [{ task_id: 'a', reason: 'Largest impact on the list' }]
    })));
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS), rewriter });

    const plan = await service.refreshPlan(USER, CHAT, NOW);

    expect(plan.today_plan.map(item => item.reason)).toEqual(['Largest impact on the list', 'Ready to start']);
    expect(store.getEvents()).toEqual([]);
  });

  it('keeps the deterministic plan when the rewrite is unusable', async () => {
    const store = new CountingStore({ tasks: TASKS });
    const rewriter = new PlanRewriteService(new StaticGenerator('{"message":"sorry"}'));
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS), rewriter });

    const plan = await service.refreshPlan(USER, CHAT, NOW);

    expect(plan.today_plan.map(item => [item.task_id, item.reason])).toEqual([
      ['a', 'High impact'],
      ['b', 'Ready to start']
    ]);
    const events = store.getEvents();
    expect(events.map(e => e.eventType)).toEqual(['plan_rewrite_discarded']);
    expect(events[0]?.entityType).toBe('plan');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back and records an event when the plan breaks its contract', async () => {
    const store = new CountingStore({ tasks: TASKS });
    const service = new PlanService(store, { engine: new MisnumberingEngine(PLAN_OPTIONS) });

    const plan = await service.refreshPlan(USER, CHAT, NOW);

    expect(plan).toEqual(createFallbackPlan(NOW));
    expect(store.getEvents().map(e => [e.eventType, e.payload])).toEqual([
      ['plan_fallback', { reason: 'today_plan.0.rank: rank 7 at position 1 is out of sequence' }]
    ]);

    const cached = await service.getTodayPlan(USER, CHAT, NOW);
    expect(cached.fallback).toBe(true);
    expect(store.taskReads).toBe(1);
  });

  it('runs concurrent refreshes for one chat one at a time', async () => {
    const store = new CountingStore({ tasks: TASKS }, 5);
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS), cacheTtlSeconds: 60 });

    const [first, second] = await Promise.all([
      service.refreshPlan(USER, CHAT, NOW),
      service.refreshPlan(USER, CHAT, later(1))
    ]);

    expect(store.maxActive).toBe(1);
    expect(first.generated_at).toBe('2026-10-18T12:00:00.000Z');
    expect(second.generated_at).toBe('2026-10-18T12:00:01.000Z');

    const cached = await service.getTodayPlan(USER, CHAT, later(1));
    expect(cached.generated_at).toBe('2026-10-18T12:00:01.000Z');
    expect(store.taskReads).toBe(2);
  });

  it('plans the bundled sample state', async () => {
    const store = InMemoryEntityStore.fromFile('data/sample-state.json');
    const service = new PlanService(store, { engine: new PlanningEngine(PLAN_OPTIONS) });

    const plan = await service.getTodayPlan('user_demo', 'chat_demo', NOW);

    expect(plan.today_plan).toEqual([
      {
        task_id: 'task_run',
        rank: 1,
        title: 'Easy 5k run',
        reason: 'Due soon, supports an active goal, quick win',
        score: 7.7,
        estimated_minutes: 30
      },
      {
        task_id: 'task_passport',
        rank: 2,
        title: 'Submit passport renewal',
        reason: 'High impact, supports an active goal, dependencies cleared, untouched for a while',
        score: 5.5667,
        estimated_minutes: 45
      },
      {
        task_id: 'task_receipts',
        rank: 3,
        title: 'Collect expense receipts',
        reason: 'Ready to start',
        score: 1.8
      }
    ]);
    expect(plan.next_actions).toEqual([]);
    expect(plan.blocked_items).toEqual([
      { task_id: 'task_flights', title: 'Book Lisbon flights', blocked_by: ['task_passport'] },
      { task_id: 'task_sensor', title: 'Replace garage door sensor', blocked_by: ['status:blocked'] },
      { task_id: 'task_tax', title: 'Finish quarterly tax draft', blocked_by: ['task_receipts'] }
    ]);
  });
});
