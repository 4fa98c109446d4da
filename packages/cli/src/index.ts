#!/usr/bin/env tsx
/**
 * @screen-digest/cli: capture, OCR and summarize the screen; serve the report.
 */

import { Command } from 'commander';
import { start } from './commands/start.js';
import { once } from './commands/once.js';
import { describeError } from './errors.js';
import type { CliOptions } from './settings.js';

const program = new Command();

program
  .name('screen-digest')
  .description('Periodic screen capture, OCR and summarization with a local report endpoint')
  .version('0.1.0');

function withPipelineOptions(command: Command): Command {
  return command
    .option('-i, --interval <ms>', 'Capture interval in milliseconds (default 240000)')
    .option('-t, --trigger <policy>', 'Summarize on cycles:N, interval:MS or on-read (default cycles:3)')
    .option('-r, --retention <policy>', 'Buffer after a summary: clear or overlap:K (default clear)')
    .option('--timeout <ms>', 'Summarization timeout in milliseconds (default 60000)')
    .option('--max-buffer <entries>', 'Drop the oldest unsummarized entries past this count')
    .option('--subject <name>', 'Name used in the report (default: OS user)')
    .option('--lang <code>', 'Tesseract language (default eng)')
    .option('--min-confidence <0-1>', 'Discard OCR results below this confidence')
    .option('--summarizer <backend>', 'extractive or openai (default extractive)')
    .option('--openai-model <model>', 'Model for the openai summarizer (default gpt-4o-mini)')
    .option('--capture-command <command>', 'Screenshot command; {output} is the PNG path to write')
    .option('-v, --verbose', 'Log every cycle');
}

withPipelineOptions(
  program
    .command('start')
    .description('Capture on a schedule and serve GET /report')
    .option('--host <host>', 'Listen address (default 127.0.0.1)')
    .option('-p, --port <port>', 'Listen port (default 5000)')
)
  .action(async (options: CliOptions) => {
    await start(options);
  });

withPipelineOptions(
  program
    .command('once')
    .description('Run one capture cycle, summarize it and print the report')
)
  .action(async (options: CliOptions) => {
    await once(options);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`[CLI] ${describeError(err)}`);
  process.exitCode = 1;
});
