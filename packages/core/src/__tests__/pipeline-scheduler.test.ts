/**
 * PipelineScheduler unit tests.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { PipelineScheduler, createPipelineScheduler } from '../pipeline/pipeline-scheduler.js';
import { ReportStore, createReportStore } from '../pipeline/report-store.js';
import { createError } from '../types/errors.js';
import type { CapturedImage, ExtractionResult } from '../types/common.js';
import type { CaptureCycle } from '../types/cycle.js';
import type { SummarizationTrigger } from '../types/config.js';

function image(): CapturedImage {
  return { data: new Uint8Array([1, 2, 3]), mimeType: 'image/png', capturedAtMs: Date.now() };
}

describe('PipelineScheduler', () => {
  let capture: Mock<() => Promise<CapturedImage>>;
  let extract: Mock<(img: CapturedImage) => Promise<ExtractionResult>>;
  let summarize: Mock<(text: string) => Promise<string>>;
  let store: ReportStore;
  let scheduler: PipelineScheduler;
  let extractCount: number;

  function build(options: {
    trigger?: SummarizationTrigger;
    captureIntervalMs?: number;
    minConfidence?: number;
    onCycle?: (cycle: CaptureCycle) => void;
  } = {}): PipelineScheduler {
    scheduler = createPipelineScheduler(
      { captureSource: { capture }, extractor: { extract }, store },
      {
        captureIntervalMs: options.captureIntervalMs ?? 1000,
        trigger: options.trigger ?? { kind: 'cycles', everyCycles: 3 },
        minConfidence: options.minConfidence,
        onCycle: options.onCycle,
      }
    );
    return scheduler;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
    extractCount = 0;

    capture = vi.fn<() => Promise<CapturedImage>>(async () => image());
    extract = vi.fn<(img: CapturedImage) => Promise<ExtractionResult>>(async () => {
      extractCount++;
      return { text: `text-${extractCount}`, confidence: 0.9 };
    });
    summarize = vi.fn<(text: string) => Promise<string>>(async (text) => `summary of ${text}`);
    store = createReportStore({ summarize });
  });

  afterEach(async () => {
    await vi.runOnlyPendingTimersAsync();
    await scheduler?.stop();
    vi.useRealTimers();
  });

  describe('runCycle()', () => {
    it('appends extracted text with the capture timestamp', async () => {
      build();
      const cycle = await scheduler.runCycle();

      expect(cycle).toMatchObject({ seq: 1, outcome: 'success', text: 'text-1', confidence: 0.9 });
      expect(store.getBufferSnapshot()).toEqual([{ seq: 1, text: 'text-1', timestampMs: 1_000_000 }]);
    });

    it('records a capture failure and skips extraction', async () => {
      build();
      capture.mockRejectedValueOnce(new Error('no display'));

      const cycle = await scheduler.runCycle();

      expect(cycle.outcome).toBe('failure');
      if (cycle.outcome === 'failure') {
        expect(cycle.error).toMatchObject({
          code: 'ERROR_CAPTURE_FAILED',
          message: 'no display',
          stage: 'capture',
          recoverability: 'recoverable',
        });
      }
      expect(extract).not.toHaveBeenCalled();
      expect(store.getBufferSnapshot()).toHaveLength(0);
    });

    it('records an extraction failure', async () => {
      build();
      extract.mockRejectedValueOnce(createError('ERROR_EXTRACTION_FAILED', 'tesseract crashed'));

      const cycle = await scheduler.runCycle();

      expect(cycle).toMatchObject({ outcome: 'failure', error: { code: 'ERROR_EXTRACTION_FAILED' } });
      expect(store.getBufferSnapshot()).toHaveLength(0);
    });

    it('treats empty extracted text as a failure and never summarizes it', async () => {
      build({ trigger: { kind: 'cycles', everyCycles: 1 } });
      extract.mockResolvedValueOnce({ text: '   ', confidence: 0.9 });

      const cycle = await scheduler.runCycle();
      await scheduler.stop();

      expect(cycle).toMatchObject({ outcome: 'failure', error: { code: 'ERROR_EXTRACTION_EMPTY' } });
      expect(store.getBufferSnapshot()).toHaveLength(0);
      expect(summarize).not.toHaveBeenCalled();
    });

    it('rejects results below the confidence floor', async () => {
      build({ minConfidence: 0.5 });
      extract.mockResolvedValueOnce({ text: 'blurry', confidence: 0.2 });

      const cycle = await scheduler.runCycle();

      expect(cycle).toMatchObject({ outcome: 'failure', error: { code: 'ERROR_EXTRACTION_LOW_CONFIDENCE' } });
    });

    it('never lets text from a failed cycle into the buffer', async () => {
      build({ trigger: { kind: 'on-read' } });
      const outcomes = ['ok', 'capture-fail', 'ok', 'extract-fail', 'empty', 'ok'] as const;

      for (const outcome of outcomes) {
        if (outcome === 'capture-fail') capture.mockRejectedValueOnce(new Error('busy'));
        if (outcome === 'extract-fail') extract.mockRejectedValueOnce(new Error('ocr'));
        if (outcome === 'empty') extract.mockResolvedValueOnce({ text: '' });
        await scheduler.runCycle();
      }

      expect(store.getBufferSnapshot().map(e => e.text)).toEqual(['text-1', 'text-2', 'text-3']);
      expect(scheduler.getDiagnostics()).toMatchObject({
        cyclesStarted: 6,
        cyclesSucceeded: 3,
        cyclesFailed: 3,
      });
    });

    it('returns the in-flight cycle instead of starting another', async () => {
      build();
      const first = scheduler.runCycle();
      const second = scheduler.runCycle();

      expect(second).toBe(first);
      await first;
      expect(capture).toHaveBeenCalledTimes(1);
    });

    it('notifies the cycle listener and survives a throwing one', async () => {
      const seen: number[] = [];
      build({
        onCycle: (cycle) => {
          seen.push(cycle.seq);
          throw new Error('listener bug');
        },
      });

      await scheduler.runCycle();
      await scheduler.runCycle();

      expect(seen).toEqual([1, 2]);
    });
  });

  describe('summarization triggers', () => {
    it('summarizes after every N successful cycles', async () => {
      build({ trigger: { kind: 'cycles', everyCycles: 3 } });

      await scheduler.runCycle();
      await scheduler.runCycle();
      expect(summarize).not.toHaveBeenCalled();

      await scheduler.runCycle();
      await scheduler.stop();

      expect(summarize).toHaveBeenCalledTimes(1);
      expect(summarize.mock.calls[0][0]).toBe('text-1\ntext-2\ntext-3');
      expect(store.currentReport()).toMatchObject({
        hasData: true,
        summary: 'summary of text-1\ntext-2\ntext-3',
        cycleCount: 3,
      });
    });

    it('summarizes on a wall-clock interval', async () => {
      build({ captureIntervalMs: 10_000, trigger: { kind: 'interval', intervalMs: 5000 } });
      scheduler.start();

      await vi.advanceTimersByTimeAsync(0);
      expect(summarize).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(5000);
      expect(summarize).toHaveBeenCalledTimes(1);
      expect(summarize.mock.calls[0][0]).toBe('text-1');
    });

    it('summarizes on the first read after new data', async () => {
      build({ trigger: { kind: 'on-read' } });

      scheduler.handleRead();
      expect(summarize).not.toHaveBeenCalled();

      await scheduler.runCycle();
      scheduler.handleRead();
      await scheduler.stop();
      expect(summarize).toHaveBeenCalledTimes(1);

      scheduler.handleRead();
      await scheduler.stop();
      expect(summarize).toHaveBeenCalledTimes(1);
    });

    it('ignores reads under other triggers', async () => {
      build({ trigger: { kind: 'cycles', everyCycles: 5 } });
      await scheduler.runCycle();

      scheduler.handleRead();
      await scheduler.stop();

      expect(summarize).not.toHaveBeenCalled();
    });

    it('shares the running summary with requests made meanwhile', async () => {
      build({ trigger: { kind: 'on-read' } });
      summarize.mockImplementationOnce(
        (text: string) => new Promise<string>((resolve) => setTimeout(() => resolve(`slow ${text}`), 1000))
      );
      await scheduler.runCycle();

      const first = scheduler.requestSummary();
      const second = scheduler.requestSummary();

      expect(second).toBe(first);
      await vi.advanceTimersByTimeAsync(1000);
      expect(await second).toMatchObject({ status: 'summarized' });
      expect(summarize).toHaveBeenCalledTimes(1);
    });

    it('returns the outcome of a summary a cycle already started', async () => {
      build({ trigger: { kind: 'cycles', everyCycles: 1 } });
      summarize.mockImplementationOnce(
        (text: string) => new Promise<string>((resolve) => setTimeout(() => resolve(`slow ${text}`), 50))
      );
      await scheduler.runCycle();

      const requested = scheduler.requestSummary('manual');
      await vi.advanceTimersByTimeAsync(50);

      expect(await requested).toMatchObject({ status: 'summarized', report: { summary: 'slow text-1' } });
      expect(summarize).toHaveBeenCalledTimes(1);
      expect(store.currentReport().hasData).toBe(true);
    });
  });

  describe('timer loop', () => {
    it('ticks on a fixed cadence, starting immediately', async () => {
      build();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(0);
      expect(capture).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(capture).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1000);
      expect(capture).toHaveBeenCalledTimes(3);
    });

    it('defers the next tick until an overrunning cycle completes', async () => {
      let active = 0;
      let maxActive = 0;
      capture.mockImplementation(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 2500));
        active--;
        return image();
      });

      build();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(2400);
      expect(capture).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(200);
      expect(capture).toHaveBeenCalledTimes(2);
      expect(maxActive).toBe(1);
    });

    it('keeps ticking through persistent failures', async () => {
      capture.mockRejectedValue(new Error('screen locked'));
      build();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(3000);

      expect(capture).toHaveBeenCalledTimes(4);
      expect(scheduler.getDiagnostics().cyclesFailed).toBe(4);
      expect(scheduler.isRunning()).toBe(true);
    });

    it('stops ticking after stop()', async () => {
      build();
      scheduler.start();
      await vi.advanceTimersByTimeAsync(0);

      await scheduler.stop();
      await vi.advanceTimersByTimeAsync(5000);

      expect(capture).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('waits for the in-flight cycle on stop()', async () => {
      capture.mockImplementationOnce(async () => {
        await new Promise((resolve) => setTimeout(resolve, 500));
        return image();
      });
      build();
      scheduler.start();
      await vi.advanceTimersByTimeAsync(0);

      let stopped = false;
      const stopping = scheduler.stop().then(() => {
        stopped = true;
      });
      await vi.advanceTimersByTimeAsync(100);
      expect(stopped).toBe(false);

      await vi.advanceTimersByTimeAsync(400);
      await stopping;
      expect(stopped).toBe(true);
      expect(store.getBufferSnapshot()).toHaveLength(1);
    });

    it('waits for a summary the in-flight cycle starts after stop()', async () => {
      capture.mockImplementationOnce(async () => {
        await new Promise((resolve) => setTimeout(resolve, 500));
        return image();
      });
      summarize.mockImplementationOnce(
        (text: string) => new Promise<string>((resolve) => setTimeout(() => resolve(`late ${text}`), 200))
      );
      build({ trigger: { kind: 'cycles', everyCycles: 1 } });
      scheduler.start();
      await vi.advanceTimersByTimeAsync(0);

      let stopped = false;
      const stopping = scheduler.stop().then(() => {
        stopped = true;
      });
      await vi.advanceTimersByTimeAsync(500);
      expect(summarize).toHaveBeenCalledTimes(1);
      expect(stopped).toBe(false);

      await vi.advanceTimersByTimeAsync(200);
      await stopping;
      expect(stopped).toBe(true);
      expect(store.isSummarizing()).toBe(false);
      expect(store.currentReport()).toMatchObject({ hasData: true, summary: 'late text-1' });
    });
  });
});
