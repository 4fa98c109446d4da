/**
 * @screen-digest/modules-capture
 * Screenshots through the platform's capture tool.
 */

export type { CaptureDiagnostics, CommandRunner, RunOptions, ScreenCaptureConfig } from './types.js';

export {
  OUTPUT_PLACEHOLDER,
  ScreenCaptureSource,
  createScreenCaptureSource,
  defaultCaptureCommand,
  execFileRunner,
} from './screen-capture.js';
