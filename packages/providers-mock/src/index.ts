/**
 * @screen-digest/providers-mock
 * Scriptable fakes for CaptureSource, TextExtractor and Summarizer.
 */

export {
  MockCaptureSource,
  MockTextExtractor,
  MockSummarizer,
  createMockCaptureSource,
  createMockTextExtractor,
  createMockSummarizer,
  type MockScenario,
  type MockCaptureConfig,
  type MockExtractorConfig,
  type MockSummarizerConfig,
} from './mock-provider.js';
