/**
 * Plan Service - caller around the planning engine
 * Handles what the engine leaves out: fetching, the optional
 * rewrite pass, fallback logging and the per-chat cache.
 */

import { randomUUID } from 'crypto';
import type { PlanPayload } from '../types/index.js';
import { CONFIG } from '../config.js';
import type { EntityStore } from './entity-store.js';
import { PlanningEngine, collectPlanningState } from './planner.js';
import type { PlanRewriteService } from './plan-rewrite.js';
import { createFallbackPlan, validatePlanPayload } from './plan-validation.js';

interface CachedPlan {
  payload: PlanPayload;
  storedAtMs: number;
}

export interface PlanServiceOptions {
  engine?: PlanningEngine;
  rewriter?: PlanRewriteService | null;
  cacheTtlSeconds?: number;
}

export class PlanService {
  private readonly cache = new Map<string, CachedPlan>();
  private readonly inflight = new Map<string, Promise<PlanPayload>>();
  private readonly engine: PlanningEngine;
  private readonly rewriter: PlanRewriteService | null;
  private readonly cacheTtlMs: number;

  constructor(private readonly store: EntityStore, options: PlanServiceOptions = {}) {
    this.engine = options.engine ?? new PlanningEngine();
    this.rewriter = options.rewriter ?? null;
    this.cacheTtlMs = (options.cacheTtlSeconds ?? CONFIG.PLAN_CACHE_TTL_SECONDS) * 1000;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  static cacheKey(userId: string, chatId: string): string {
    return `plan:today:${userId}:${chatId}`;
  }

  /**
   * Cached plan when still fresh and valid, otherwise a fresh one
   */
  async getTodayPlan(userId: string, chatId: string, now: Date = new Date()): Promise<PlanPayload> {
    const key = PlanService.cacheKey(userId, chatId);
    const cached = this.cache.get(key);

    if (cached && this.isFresh(cached, now)) {
      const check = validatePlanPayload(cached.payload);
      if (check.valid) {
        return check.payload;
      }
      console.warn(`Cached plan invalid for ${key}: ${check.reason}`);
      this.cache.delete(key);
    } else if (cached) {
      this.cache.delete(key);
    }

    return this.refreshPlan(userId, chatId, now);
  }

  /**
   * Rebuild and cache. Refreshes for the same chat run one after another
   * so cache writes land in request order.
   */
  async refreshPlan(userId: string, chatId: string, now: Date = new Date()): Promise<PlanPayload> {
    const key = PlanService.cacheKey(userId, chatId);
    const previous = this.inflight.get(key);

    const run = (async () => {
      if (previous) {
        await Promise.allSettled([previous]);
      }
      return this.computeAndCache(key, userId, now);
    })();

    this.inflight.set(key, run);
    try {
      return await run;
    } finally {
      if (this.inflight.get(key) === run) {
        this.inflight.delete(key);
      }
    }
  }

  private async computeAndCache(key: string, userId: string, now: Date): Promise<PlanPayload> {
    const debug = process.env.DEBUG === 'true';
    const state = await collectPlanningState(this.store, userId);
    let payload = this.engine.buildPlan(state, now);

    if (this.rewriter) {
      const rewritten = await this.rewriter.rewrite(payload);
      if (rewritten.valid) {
        payload = rewritten.payload;
      } else {
        console.warn(`Plan rewrite discarded for ${key}: ${rewritten.reason}`);
        await this.recordEvent(userId, 'plan_rewrite_discarded', { reason: rewritten.reason }, now);
      }
    }

    const check = validatePlanPayload(payload);
    if (!check.valid) {
      console.warn(`Plan validation failed for ${key}, using fallback: ${check.reason}`);
      await this.recordEvent(userId, 'plan_fallback', { reason: check.reason }, now);
      payload = createFallbackPlan(now);
    } else {
      payload = check.payload;
    }

    this.evictExpired(now);
    this.cache.set(key, { payload, storedAtMs: now.getTime() });

    if (debug) {
      console.log(`[INFO] Plan refreshed for ${key}: ${payload.today_plan.length} today, ${payload.next_actions.length} next, ${payload.blocked_items.length} blocked`);
    }
    return payload;
  }

  private isFresh(entry: CachedPlan, now: Date): boolean {
    return now.getTime() - entry.storedAtMs < this.cacheTtlMs;
  }

  private evictExpired(now: Date): void {
    for (const [key, entry] of this.cache) {
      if (!this.isFresh(entry, now)) {
        this.cache.delete(key);
      }
    }
  }

  private async recordEvent(userId: string, eventType: string, payload: Record<string, unknown>, now: Date): Promise<void> {
    await this.store.appendEvent({
      id: randomUUID(),
      userId,
      eventType,
      entityType: 'plan',
      entityId: null,
      payload,
      createdAt: now.toISOString()
    });
  }
}
