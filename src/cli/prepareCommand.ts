/**
 * Proxy Sheets – `prepare` Command
 *
 * Compiles the dataset plus override files into the YAML manifest (and the local overlay).
 *
 *   prepare <source_dataset_dir> <override_manifest.toml> <output_manifest>
 *           [--local-manifest <path>] [--local-output <path>]
 *
 * Exit status is 0 on success and 1 on any failure; the error and its ids go to the log.
 */

import { Command, CommanderError } from 'commander';

import { prepareManifests } from '../compiler/compileManifest';
import { describeError } from '../utils/errors';
import { logError, logInfo } from '../utils/fileHelpers';

const TAG = 'prepare';

interface PrepareCliOptions {
  localManifest?: string;
  localOutput?: string;
}

export function buildPrepareCommand(): Command {
  return new Command('prepare')
    .description('Compile the card dataset and TOML overrides into a YAML manifest')
    .argument('<source_dataset_dir>', 'root of the card dataset (contains v2/)')
    .argument('<override_manifest>', 'override TOML file declaring collections, cards and remaps')
    .argument('<output_manifest>', 'where to write the compiled YAML manifest')
    .option('--local-manifest <path>', 'local-only override TOML (default: <stem>.local.toml if present)')
    .option('--local-output <path>', 'where to write the local overlay manifest')
    .exitOverride();
}

export async function runPrepareCli(argv: ReadonlyArray<string>): Promise<number> {
  const command = buildPrepareCommand();
  command.action(async (datasetDir: string, overridePath: string, outputPath: string, options: PrepareCliOptions) => {
    const result = await prepareManifests({
      datasetDir,
      overridePath,
      outputPath,
      localManifestPath: options.localManifest,
      localOutputPath: options.localOutput,
    });
    logInfo(
      TAG,
      `Compiled ${result.primary.cards.length} cards into ${result.outputPath}` +
        (result.overlayPath ? ` (overlay: ${result.overlayPath})` : '')
    );
  });

  try {
    await command.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    logError(TAG, describeError(err));
    return 1;
  }
}
