/**
 * JSON-mode chat completion shared by the plan rewrite and summarization passes
 */

import OpenAI from 'openai';

export interface TextGenerator {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export class OpenAITextGenerator implements TextGenerator {
  private openai: OpenAI;

  constructor(private readonly model: string) {
    this.openai = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY
    });
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt }
      ],
      temperature: 0.3,
      response_format: { type: 'json_object' }
    });
    return response.choices[0]?.message?.content ?? '';
  }
}
