/**
 * Summarizer backed by the OpenAI chat completions API.
 */

import OpenAI from 'openai';
import { createError, type SummarizeOptions, type Summarizer } from '@screen-digest/core';

export interface OpenAISummarizerConfig {
  /** Default: OPENAI_API_KEY from the environment */
  apiKey?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Pre-built client, e.g. pointed at a compatible endpoint */
  client?: OpenAI;
}

const SYSTEM_PROMPT =
  'You summarize text captured from a computer screen by OCR. The text is noisy and ' +
  'comes from several screenshots in chronological order. Reply with a short plain-text ' +
  'summary of what the person was reading or working on, in one to three sentences, ' +
  'without preamble.';

export class OpenAISummarizer implements Summarizer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: OpenAISummarizerConfig) {
    this.client = config.client ?? new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
    this.temperature = config.temperature ?? 0.3;
    this.maxTokens = config.maxTokens ?? 200;
  }

  async summarize(text: string, options: SummarizeOptions = {}): Promise<string> {
    let content: string | null | undefined;
    try {
      const resp = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          max_tokens: this.maxTokens,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: text },
          ],
        },
        { signal: options.signal }
      );
      content = resp.choices[0]?.message?.content;
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      const rejected = status === 401 || status === 403;
      throw createError(
        'ERROR_SUMMARIZATION_FAILED',
        `OpenAI request failed: ${err instanceof Error ? err.message : String(err)}`,
        {
          recoverability: rejected ? 'non-recoverable' : 'recoverable',
          cause: err,
          stage: 'summarization',
          details: { model: this.model, status },
          userAction: rejected ? 'Check OPENAI_API_KEY.' : undefined,
        }
      );
    }

    const summary = content?.trim() ?? '';
    if (!summary) {
      throw createError('ERROR_SUMMARIZATION_FAILED', 'OpenAI returned an empty summary', {
        recoverability: 'recoverable',
        stage: 'summarization',
        details: { model: this.model },
      });
    }
    return summary;
  }
}

export function createOpenAISummarizer(config: OpenAISummarizerConfig): OpenAISummarizer {
  return new OpenAISummarizer(config);
}
