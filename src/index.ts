/**
 * Proxy Sheets – HTTP Service Entry Point
 *
 * PURPOSE:
 *   Loads the compiled manifest (and its local overlay, when one sits beside it) into a catalog,
 *   then serves the manifest, local assets and sheet generation over HTTP.
 *
 * CONTEXT:
 *   - Configuration comes from the environment (see .env.example): PORT, MANIFEST_PATH and the
 *     sheet generation settings.
 *   - The server only starts listening once the catalog has loaded, so no request ever sees a
 *     half-initialized service.
 */

import { createApp } from './app';
import { Catalog } from './catalog/catalog';
import { getEnv } from './utils/config';
import { describeError } from './utils/errors';
import { logError, logInfo } from './utils/fileHelpers';

const TAG = 'server';

async function main(): Promise<void> {
  const env = getEnv();
  const catalog = await Catalog.load(env.MANIFEST_PATH);
  const app = createApp({ catalog, manifestPath: env.MANIFEST_PATH });

  app.listen(env.PORT, () => {
    logInfo(TAG, `Server running on port ${env.PORT}`);
  });
}

main().catch((err: unknown) => {
  logError(TAG, `Failed to start: ${describeError(err)}`);
  process.exitCode = 1;
});
