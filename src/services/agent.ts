/**
 * OpenAI Agent Setup
 * Answers read-only questions from an assembled context envelope
 */

import { Agent } from '@openai/agents';
import type { ContextEnvelope } from '../types/index.js';
import { CONFIG } from '../config.js';

/**
 * Every kept layer except the query, in envelope order
 */
export function buildInstructions(envelope: ContextEnvelope): string {
  return envelope.context
    .filter((_, index) => envelope.metadata.layers[index] !== 'query')
    .join('\n\n');
}

/**
 * The rendered query layer, or '' when budget clipping dropped it
 */
export function queryText(envelope: ContextEnvelope): string {
  const index = envelope.metadata.layers.indexOf('query');
  return index >= 0 ? envelope.context[index] ?? '' : '';
}

export function createAgent(envelope: ContextEnvelope): Agent {
  return new Agent({
    name: 'PersonalAssistant',
    instructions: buildInstructions(envelope),
    model: CONFIG.LLM_MODEL_QUERY
  });
}
