/**
 * @screen-digest/modules-summarizer
 * Summarizer backends: local extractive and OpenAI.
 */

export {
  summarize,
  createExtractiveSummarizer,
  type ExtractiveSummarizerConfig,
  type SummaryPassage,
  type SummaryResult,
} from './extractive.js';

export {
  OpenAISummarizer,
  createOpenAISummarizer,
  type OpenAISummarizerConfig,
} from './openai-summarizer.js';
