/**
 * Capture module types.
 */

export interface RunOptions {
  timeoutMs: number;
}

/** Runs an external program to completion; rejects on non-zero exit. */
export type CommandRunner = (file: string, args: string[], options: RunOptions) => Promise<void>;

export interface ScreenCaptureConfig {
  /**
   * Program and arguments; `{output}` is replaced with the PNG path to write.
   * Default: the platform's screenshot tool.
   */
  command?: string[];
  /** Default: process.platform */
  platform?: NodeJS.Platform;
  /** Directory for the transient screenshot file. Default: os.tmpdir() */
  tempDir?: string;
  /** Default: 30000 */
  timeoutMs?: number;
  runner?: CommandRunner;
  verbose?: boolean;
}

export interface CaptureDiagnostics {
  command: string;
  captures: number;
  failures: number;
  lastDurationMs?: number;
  lastBytes?: number;
}
