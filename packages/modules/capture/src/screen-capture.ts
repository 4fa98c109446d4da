/**
 * Full-screen capture through the platform's screenshot tool.
 *
 * Each capture writes a PNG to a unique temp path, reads it back and deletes
 * it before returning, so no screenshot outlives its cycle.
 */

import { execFile } from 'node:child_process';
import { readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import {
  createError,
  type CaptureSource,
  type CapturedImage,
  type ScreenDigestError,
} from '@screen-digest/core';
import type { CaptureDiagnostics, CommandRunner, ScreenCaptureConfig } from './types.js';

const execFileAsync = promisify(execFile);

export const OUTPUT_PLACEHOLDER = '{output}';

const DEFAULT_TIMEOUT_MS = 30_000;

const WINDOWS_CAPTURE_SCRIPT = [
  'Add-Type -AssemblyName System.Windows.Forms, System.Drawing;',
  '$b = [System.Windows.Forms.SystemInformation]::VirtualScreen;',
  '$bmp = New-Object System.Drawing.Bitmap $b.Width, $b.Height;',
  '$g = [System.Drawing.Graphics]::FromImage($bmp);',
  '$g.CopyFromScreen($b.Left, $b.Top, 0, 0, $bmp.Size);',
  `$bmp.Save('${OUTPUT_PLACEHOLDER}', [System.Drawing.Imaging.ImageFormat]::Png);`,
  '$g.Dispose(); $bmp.Dispose()',
].join(' ');

type ExecError = Error & {
  code?: number | string;
  stderr?: string;
};

/**
 * Default screenshot command for a platform, or null when there is none.
 */
export function defaultCaptureCommand(platform: NodeJS.Platform): string[] | null {
  switch (platform) {
    case 'darwin':
      return ['screencapture', '-x', '-t', 'png', OUTPUT_PLACEHOLDER];
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      // ImageMagick
      return ['import', '-window', 'root', OUTPUT_PLACEHOLDER];
    case 'win32':
      return ['powershell', '-NoProfile', '-NonInteractive', '-Command', WINDOWS_CAPTURE_SCRIPT];
    default:
      return null;
  }
}

export const execFileRunner: CommandRunner = async (file, args, options) => {
  await execFileAsync(file, args, { timeout: options.timeoutMs, windowsHide: true });
};

function normalizeCaptureError(error: unknown, program: string): ScreenDigestError {
  if (error instanceof Error) {
    const execError: ExecError = error;

    if (execError.code === 'ENOENT') {
      return createError('ERROR_CAPTURE_FAILED', `Screenshot tool not found: ${program}`, {
        recoverability: 'non-recoverable',
        cause: error,
        stage: 'capture',
        userAction: `Install ${program} or set a capture command with {output}.`,
      });
    }

    const stderr = execError.stderr?.trim();
    return createError('ERROR_CAPTURE_FAILED', stderr ? `${error.message}: ${stderr}` : error.message, {
      recoverability: 'recoverable',
      cause: error,
      stage: 'capture',
    });
  }

  return createError('ERROR_CAPTURE_FAILED', String(error), {
    recoverability: 'recoverable',
    cause: error,
    stage: 'capture',
  });
}

export class ScreenCaptureSource implements CaptureSource {
  private readonly program: string;
  private readonly args: string[];
  private readonly tempDir: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly verbose: boolean;

  private counter = 0;
  private captures = 0;
  private failures = 0;
  private lastDurationMs?: number;
  private lastBytes?: number;

  constructor(config: ScreenCaptureConfig = {}) {
    const platform = config.platform ?? process.platform;
    const command = config.command ?? defaultCaptureCommand(platform);

    if (!command || command.length === 0) {
      throw createError('ERROR_INVALID_CONFIG', `No screenshot command known for platform "${platform}"`, {
        userAction: 'Set a capture command containing {output}.',
      });
    }
    if (!command.some(arg => arg.includes(OUTPUT_PLACEHOLDER))) {
      throw createError('ERROR_INVALID_CONFIG', `Capture command must contain ${OUTPUT_PLACEHOLDER}`);
    }

    const [program, ...args] = command;
    this.program = program;
    this.args = args;
    this.tempDir = config.tempDir ?? tmpdir();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = config.runner ?? execFileRunner;
    this.verbose = config.verbose ?? false;
  }

  async capture(): Promise<CapturedImage> {
    const capturedAtMs = Date.now();
    const filePath = join(this.tempDir, `screen-digest-${process.pid}-${capturedAtMs}-${++this.counter}.png`);
    const args = this.args.map(arg => arg.split(OUTPUT_PLACEHOLDER).join(filePath));

    try {
      try {
        await this.runner(this.program, args, { timeoutMs: this.timeoutMs });
      } catch (err) {
        throw normalizeCaptureError(err, this.program);
      }

      const data = await this.readScreenshot(filePath);

      this.captures++;
      this.lastDurationMs = Date.now() - capturedAtMs;
      this.lastBytes = data.length;

      if (this.verbose) {
        console.log(`[Capture] ${data.length} bytes in ${this.lastDurationMs}ms`);
      }

      return { data: new Uint8Array(data), mimeType: 'image/png', capturedAtMs };
    } catch (err) {
      this.failures++;
      throw err;
    } finally {
      await this.removeFile(filePath);
    }
  }

  getDiagnostics(): CaptureDiagnostics {
    return {
      command: this.program,
      captures: this.captures,
      failures: this.failures,
      lastDurationMs: this.lastDurationMs,
      lastBytes: this.lastBytes,
    };
  }

  private async readScreenshot(filePath: string): Promise<Buffer> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (err) {
      throw createError('ERROR_CAPTURE_FAILED', 'Screenshot file was not created', {
        recoverability: 'recoverable',
        cause: err,
        stage: 'capture',
      });
    }

    if (data.length === 0) {
      throw createError('ERROR_CAPTURE_FAILED', 'Screenshot file was empty', {
        recoverability: 'recoverable',
        stage: 'capture',
      });
    }
    return data;
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (err) {
      console.warn(`[Capture] Could not delete ${filePath}:`, err);
    }
  }
}

export function createScreenCaptureSource(config?: ScreenCaptureConfig): ScreenCaptureSource {
  return new ScreenCaptureSource(config);
}
