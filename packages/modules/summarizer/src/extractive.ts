/**
 * Local extractive summarizer for screen text.
 *
 * Input is one capture per line (the report store joins buffer entries with
 * a newline). Each capture is cut into passages: its sentences, with long
 * unpunctuated runs split at word boundaries. Passages are scored by how
 * distinctive their terms are across the window and by how recent their
 * capture is. Every capture keeps its best passage; the rest of the budget
 * goes to the highest scores. No network, no model download.
 */

import { createError, type SummarizeOptions, type Summarizer } from '@screen-digest/core';
import stopwordList from './stopwords.json';

export interface ExtractiveSummarizerConfig {
  /** Maximum passages, raised to one per capture when there are more captures. Default: 5 */
  maxSentences?: number;
  /** Shorter passages are never picked. Default: 20 */
  minSentenceLength?: number;
  /** Longest passage cut from an unpunctuated run. Default: 200 */
  maxPassageChars?: number;
  /** Weight for term distinctiveness. Default: 0.7 */
  contentWeight?: number;
  /** Weight for capture recency (latest = 1). Default: 0.3 */
  recencyWeight?: number;
  /** Hard cap on summary length. Default: 600 */
  maxChars?: number;
}

export interface SummaryPassage {
  text: string;
  score: number;
  /** Index of the capture (line) the passage came from */
  capture: number;
  /** Index of the passage across the whole input */
  position: number;
}

export interface SummaryResult {
  summary: string;
  sentences: SummaryPassage[];
  compressionRatio: number;
}

const DEFAULTS: Required<ExtractiveSummarizerConfig> = {
  maxSentences: 5,
  minSentenceLength: 20,
  maxPassageChars: 200,
  contentWeight: 0.7,
  recencyWeight: 0.3,
  maxChars: 600,
};

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

function terms(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return words.filter(word => word.length > 2 && !STOPWORDS.has(word));
}

function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > maxChars * 0.5 ? cut.slice(0, lastSpace) : cut).trim();
}

/** Sentences of one capture, long runs broken into word-bounded chunks. */
function splitPassages(capture: string, maxPassageChars: number): string[] {
  const passages: string[] = [];

  for (const sentence of capture.split(/(?<=[.!?])\s+/)) {
    let rest = sentence.trim();
    while (rest.length > maxPassageChars) {
      const chunk = truncateAtWord(rest, maxPassageChars);
      passages.push(chunk);
      rest = rest.slice(chunk.length).trim();
    }
    if (rest.length > 0) passages.push(rest);
  }

  return passages;
}

function resolveConfig(config?: ExtractiveSummarizerConfig): Required<ExtractiveSummarizerConfig> {
  return {
    maxSentences: config?.maxSentences ?? DEFAULTS.maxSentences,
    minSentenceLength: config?.minSentenceLength ?? DEFAULTS.minSentenceLength,
    maxPassageChars: config?.maxPassageChars ?? DEFAULTS.maxPassageChars,
    contentWeight: config?.contentWeight ?? DEFAULTS.contentWeight,
    recencyWeight: config?.recencyWeight ?? DEFAULTS.recencyWeight,
    maxChars: config?.maxChars ?? DEFAULTS.maxChars,
  };
}

function scorePassages(
  passages: Array<Omit<SummaryPassage, 'score'>>,
  captureCount: number,
  cfg: Required<ExtractiveSummarizerConfig>
): SummaryPassage[] {
  const termLists = passages.map(p => terms(p.text));

  const docFreq = new Map<string, number>();
  for (const list of termLists) {
    for (const term of new Set(list)) {
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }

  // Mean inverse passage frequency of the passage's terms
  const content = termLists.map(list => {
    if (list.length === 0) return 0;
    const total = list.reduce((sum, term) => sum + Math.log(1 + passages.length / (docFreq.get(term) ?? 1)), 0);
    return total / list.length;
  });
  const topContent = Math.max(0, ...content);

  return passages.map((p, i) => {
    const recency = captureCount > 1 ? p.capture / (captureCount - 1) : 1;
    const distinct = topContent > 0 ? content[i] / topContent : 0;
    return { ...p, score: cfg.contentWeight * distinct + cfg.recencyWeight * recency };
  });
}

/** Best passage of each capture, then the best of the rest while they fit. */
function selectPassages(scored: SummaryPassage[], cfg: Required<ExtractiveSummarizerConfig>): SummaryPassage[] {
  const byScore = [...scored].sort((a, b) => b.score - a.score || a.position - b.position);

  const chosen: SummaryPassage[] = [];
  const covered = new Set<number>();
  for (const passage of byScore) {
    if (!covered.has(passage.capture)) {
      covered.add(passage.capture);
      chosen.push(passage);
    }
  }

  const limit = Math.max(chosen.length, cfg.maxSentences);
  let used = chosen.reduce((sum, p) => sum + p.text.length + 1, -1);
  for (const passage of byScore) {
    if (chosen.length >= limit) break;
    if (chosen.includes(passage)) continue;
    if (used + 1 + passage.text.length <= cfg.maxChars) {
      chosen.push(passage);
      used += 1 + passage.text.length;
    }
  }

  return chosen.sort((a, b) => a.position - b.position);
}

/** Share the length cap evenly when the per-capture picks alone overflow it. */
function fitToBudget(chosen: SummaryPassage[], maxChars: number): string[] {
  const texts = chosen.map(p => p.text);
  const length = texts.reduce((sum, t) => sum + t.length + 1, -1);
  if (length <= maxChars) return texts;

  const share = Math.max(1, Math.floor((maxChars - (texts.length - 1)) / texts.length));
  return texts.map(t => truncateAtWord(t, share));
}

/**
 * Summarize newline-separated captures.
 */
export function summarize(text: string, config?: ExtractiveSummarizerConfig): SummaryResult {
  const cfg = resolveConfig(config);
  const captures = text.split('\n').map(line => line.trim()).filter(line => line.length > 0);
  const source = captures.join(' ');

  let position = 0;
  const candidates = captures.flatMap((capture, captureIndex) =>
    splitPassages(capture, cfg.maxPassageChars)
      .map(passage => ({ text: passage, capture: captureIndex, position: position++ }))
      .filter(p => p.text.length >= cfg.minSentenceLength)
  );

  if (candidates.length === 0) {
    return {
      summary: truncateAtWord(source, cfg.maxChars),
      sentences: [],
      compressionRatio: 1,
    };
  }

  const whole = candidates.map(p => p.text).join(' ');
  if (candidates.length <= cfg.maxSentences && whole.length <= cfg.maxChars) {
    return {
      summary: whole,
      sentences: candidates.map(p => ({ ...p, score: 1 })),
      compressionRatio: whole.length / source.length,
    };
  }

  const chosen = selectPassages(scorePassages(candidates, captures.length, cfg), cfg);
  const summary = truncateAtWord(fitToBudget(chosen, cfg.maxChars).join(' '), cfg.maxChars);

  return {
    summary,
    sentences: chosen,
    compressionRatio: summary.length / source.length,
  };
}

/**
 * Summarizer backed by `summarize()`. Runs synchronously; an already-aborted
 * signal is honored.
 */
export function createExtractiveSummarizer(config?: ExtractiveSummarizerConfig): Summarizer {
  return {
    async summarize(text: string, options: SummarizeOptions = {}): Promise<string> {
      if (options.signal?.aborted) {
        throw createError('ERROR_SUMMARIZATION_FAILED', 'Summarization aborted', {
          recoverability: 'recoverable',
          stage: 'summarization',
        });
      }
      return summarize(text, config).summary;
    },
  };
}
