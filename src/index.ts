/**
 * Personal Assistant Core - interactive entry point
 * Loads an entity snapshot and exposes context assembly, planning and compaction
 */

import * as readline from 'readline';
import { run } from '@openai/agents';
import { InMemoryEntityStore } from './services/entity-store.js';
import { ContextManager, collectMemorySnapshot } from './services/context-manager.js';
import { PlanService } from './services/plan-service.js';
import { PlanRewriteService } from './services/plan-rewrite.js';
import { OpenAITextGenerator } from './services/text-generator.js';
import { SummarizationService } from './services/summarization.js';
import { RetentionJob } from './services/retention.js';
import { createAgent, queryText } from './services/agent.js';
import { createTokenEstimator } from './utils/token-counter.js';
import type { PlanItem, PlanPayload } from './types/index.js';
import { CONFIG } from './config.js';

function formatItems(items: PlanItem[]): string[] {
  return items.map(item => `  ${item.rank}. ${item.title} [${item.task_id}]${item.reason ? ` - ${item.reason}` : ''}`);
}

function formatPlan(plan: PlanPayload): string {
  const lines: string[] = [];
  lines.push(`Plan for ${plan.plan_window} (generated ${plan.generated_at})${plan.fallback ? ' [fallback]' : ''}`);
  lines.push('Today:');
  lines.push(...(plan.today_plan.length > 0 ? formatItems(plan.today_plan) : ['  (nothing ready)']));
  if (plan.next_actions.length > 0) {
    lines.push('Next:');
    lines.push(...formatItems(plan.next_actions));
  }
  if (plan.blocked_items.length > 0) {
    lines.push('Blocked:');
    plan.blocked_items.forEach(item => {
      lines.push(`  - ${item.title} [${item.task_id}] by ${item.blocked_by.join(', ')}`);
    });
  }
  return lines.join('\n');
}

async function main() {
  const hasApiKey = Boolean(process.env.OPENAI_API_KEY);
  const userId = CONFIG.DEFAULT_USER_ID;
  const chatId = CONFIG.DEFAULT_CHAT_ID;

  console.log('Personal Assistant Core');
  console.log('=======================');
  console.log(`Snapshot: ${CONFIG.DATA_PATH}`);
  console.log(`User/chat: ${userId}/${chatId}`);
  console.log(`Context ceiling: ${CONFIG.MEMORY_CONTEXT_MAX_TOKENS} tokens, query budget: ${CONFIG.QUERY_MAX_TOKENS}`);
  console.log('Commands: "/plan", "/refresh", "/context <text>", "/summarize", "/compact", "exit"');
  if (!hasApiKey) {
    console.log('OPENAI_API_KEY not set: free-form questions, summaries and plan rewriting are disabled');
  }
  console.log();

  // Initialize services
  const store = InMemoryEntityStore.fromFile(CONFIG.DATA_PATH);
  const contextManager = new ContextManager({}, createTokenEstimator(CONFIG.MEMORY_PRECISE_TOKEN_ESTIMATOR));
  const rewriter = hasApiKey && CONFIG.PLAN_REWRITE_ENABLED
    ? new PlanRewriteService(new OpenAITextGenerator(CONFIG.LLM_MODEL_PLAN))
    : null;
  const planService = new PlanService(store, { rewriter });
  const summarizer = hasApiKey
    ? new SummarizationService(store, new OpenAITextGenerator(CONFIG.LLM_MODEL_SUMMARIZE))
    : null;
  const retentionJob = new RetentionJob(store);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const askQuestion = (query: string): Promise<string> => {
    return new Promise(resolve => rl.question(query, resolve));
  };

  while (true) {
    try {
      const userInput = (await askQuestion('\nYou: ')).trim();

      if (userInput.toLowerCase() === 'exit') {
        console.log('\nGoodbye!');
        break;
      }
      if (!userInput) {
        continue;
      }

      if (userInput === '/plan' || userInput === '/refresh') {
        const plan = userInput === '/plan'
          ? await planService.getTodayPlan(userId, chatId)
          : await planService.refreshPlan(userId, chatId);
        console.log(`\n${formatPlan(plan)}`);
        continue;
      }

      if (userInput === '/summarize') {
        if (!summarizer) {
          console.error('\n❌ Error: OPENAI_API_KEY is required to summarize');
          continue;
        }
        const summary = await summarizer.summarize(userId, chatId);
        console.log(summary
          ? `\nSummary ${summary.id} (${summary.sourceIds.length} turns): ${summary.summaryText}`
          : '\nNothing to summarize');
        continue;
      }

      if (userInput === '/compact') {
        const report = await retentionJob.run();
        console.log(`\nCompaction: deleted ${report.deleted} of ${report.scanned} inbox items older than ${report.cutoff}`);
        continue;
      }

      const snapshot = await collectMemorySnapshot(store, userId, chatId);

      if (userInput.startsWith('/context')) {
        const envelope = contextManager.buildContext(snapshot, {
          userId,
          chatId,
          query: userInput.slice('/context'.length).trim(),
          maxTokens: CONFIG.QUERY_MAX_TOKENS
        });
        console.log(`\n${JSON.stringify(envelope, null, 2)}`);
        continue;
      }

      if (!hasApiKey) {
        console.error('\n❌ Error: OPENAI_API_KEY is required to answer questions');
        continue;
      }

      const envelope = contextManager.buildContext(snapshot, {
        userId,
        chatId,
        query: userInput,
        maxTokens: CONFIG.QUERY_MAX_TOKENS
      });
      console.log(`[${envelope.budget.estimated_used}/${envelope.budget.applied} tokens]`);

      const agent = createAgent(envelope);
      const question = queryText(envelope) || userInput;
      const result = await run(agent, question);
      console.log(`\nAssistant: ${result.finalOutput || 'No response generated'}`);
    } catch (error) {
      console.error(`\n❌ Error: ${error instanceof Error ? error.message : String(error)}`);
      if (process.env.DEBUG === 'true' && error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    }
  }

  rl.close();
}

// Run the application
main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
