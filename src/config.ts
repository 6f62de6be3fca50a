/**
 * Configuration constants
 */

import { config } from 'dotenv';

// Load environment variables before reading them
config();

export const CONFIG = {
  DATA_PATH: process.env.DATA_PATH || './data/sample-state.json',
  DEFAULT_USER_ID: process.env.DEFAULT_USER_ID || 'user_demo',
  DEFAULT_CHAT_ID: process.env.DEFAULT_CHAT_ID || 'chat_demo',

  // Context assembly
  MEMORY_CONTEXT_MAX_TOKENS: parseInt(process.env.MEMORY_CONTEXT_MAX_TOKENS || '3000', 10),
  MEMORY_HOT_TURNS_LIMIT: parseInt(process.env.MEMORY_HOT_TURNS_LIMIT || '8', 10),
  MEMORY_RELATED_ENTITIES_LIMIT: parseInt(process.env.MEMORY_RELATED_ENTITIES_LIMIT || '25', 10),
  QUERY_MAX_TOKENS: parseInt(process.env.QUERY_MAX_TOKENS || '2000', 10),
  MEMORY_PRECISE_TOKEN_ESTIMATOR: process.env.MEMORY_PRECISE_TOKEN_ESTIMATOR === 'true',
  MEMORY_SUMMARY_WINDOW: parseInt(process.env.MEMORY_SUMMARY_WINDOW || '10', 10),

  // Compaction
  TRANSCRIPT_RETENTION_DAYS: parseInt(process.env.TRANSCRIPT_RETENTION_DAYS || '30', 10),

  // Planning
  PLAN_TOP_N_TODAY: parseInt(process.env.PLAN_TOP_N_TODAY || '6', 10),
  PLAN_TOP_N_NEXT: parseInt(process.env.PLAN_TOP_N_NEXT || '8', 10),
  PLAN_WEIGHT_URGENCY: parseFloat(process.env.PLAN_WEIGHT_URGENCY || '4.0'),
  PLAN_WEIGHT_IMPACT: parseFloat(process.env.PLAN_WEIGHT_IMPACT || '3.0'),
  // Goal alignment and staleness weights are product tuning, not algorithm
  PLAN_WEIGHT_GOAL_ALIGNMENT: parseFloat(process.env.PLAN_WEIGHT_GOAL_ALIGNMENT || '2.0'),
  PLAN_WEIGHT_STALENESS: parseFloat(process.env.PLAN_WEIGHT_STALENESS || '1.0'),
  PLAN_WEIGHT_BLOCKER_PENALTY: parseFloat(process.env.PLAN_WEIGHT_BLOCKER_PENALTY || '6.0'),
  PLAN_QUICK_WIN_BONUS: parseFloat(process.env.PLAN_QUICK_WIN_BONUS || '0.5'),
  PLAN_QUICK_WIN_PRIORITY: parseInt(process.env.PLAN_QUICK_WIN_PRIORITY || '4', 10),
  PLAN_DUE_SOON_DAYS: parseInt(process.env.PLAN_DUE_SOON_DAYS || '2', 10),
  PLAN_STALE_AFTER_DAYS: parseInt(process.env.PLAN_STALE_AFTER_DAYS || '7', 10),
  PLAN_STALE_SATURATION_DAYS: parseInt(process.env.PLAN_STALE_SATURATION_DAYS || '30', 10),
  PLAN_CACHE_TTL_SECONDS: parseInt(process.env.PLAN_CACHE_TTL_SECONDS || '900', 10),

  // Optional LLM rewrite of plan reasons (ordering is never touched)
  PLAN_REWRITE_ENABLED: process.env.PLAN_REWRITE_ENABLED === 'true',
  LLM_MODEL_PLAN: process.env.LLM_MODEL_PLAN || 'gpt-4o-mini',
  LLM_MODEL_QUERY: process.env.LLM_MODEL_QUERY || 'gpt-4o-mini',
  LLM_MODEL_SUMMARIZE: process.env.LLM_MODEL_SUMMARIZE || 'gpt-4o-mini'
} as const;
