/**
 * `screen-digest once`: one capture cycle, one summary, report on stdout.
 */

import { describeError } from '../errors.js';
import { createComponents } from '../components.js';
import { buildSettings, type CliOptions } from '../settings.js';

export async function once(options: CliOptions): Promise<void> {
  const { digest, extractor } = await createComponents(buildSettings(options));

  try {
    const cycle = await digest.runCycle();
    if (cycle.outcome === 'failure') {
      console.error(`[CLI] Capture cycle failed: ${describeError(cycle.error)}`);
      process.exitCode = 1;
      return;
    }

    const outcome = await digest.requestSummary();
    if (outcome.status === 'failed') {
      console.error(`[CLI] Summarization failed: ${describeError(outcome.error)}`);
      process.exitCode = 1;
      return;
    }

    process.stdout.write(digest.service.renderText(digest.store.currentReport()));
  } finally {
    await digest.stop();
    await extractor.teardown();
  }
}
