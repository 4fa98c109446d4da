/**
 * `screen-digest start`: run the pipeline and serve GET /report until stopped.
 */

import { createReportApp, startServer } from '@screen-digest/server';
import { describeError } from '../errors.js';
import { createComponents } from '../components.js';
import { buildSettings, type CliOptions } from '../settings.js';

export async function start(options: CliOptions): Promise<void> {
  const { digest, extractor } = await createComponents(buildSettings(options));

  const app = createReportApp({
    service: digest.service,
    diagnostics: () => digest.getDiagnostics(),
  });

  const server = await startServer(app, digest.config.listen).catch(async (err: unknown) => {
    await extractor.teardown();
    throw err;
  });

  digest.start();

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log(`[CLI] ${signal} received, shutting down`);

    await digest.stop();
    await server.close();
    await extractor.teardown();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error(`[CLI] Shutdown failed: ${describeError(err)}`);
        process.exitCode = 1;
      });
    });
  }
}
