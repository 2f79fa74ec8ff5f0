/**
 * Proxy Sheets – `print-sheets` Command
 *
 *   print-sheets <deck_list> <output.pdf> [--manifest <path>] [--paper a4|letter]
 *                [--bleed none|narrow|medium|wide] [--cut marks|lines|none]
 *                [--rows <n>] [--columns <n>]
 *
 * Ctrl-C aborts outstanding downloads and leaves no PDF behind.
 */

import fs from 'fs';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';

import { Catalog } from '../catalog/catalog';
import { buildProfile, profileOptionsSchema } from '../sheets/geometry';
import { writeSheets } from '../sheets/generateSheets';
import { SelectionBuilder } from '../sheets/selection';
import type { FetchLike } from '../sheets/assetFetcher';
import { getEnv } from '../utils/config';
import { LoadError, describeError } from '../utils/errors';
import { logError, logInfo, logWarn } from '../utils/fileHelpers';

const TAG = 'print-sheets';

interface PrintSheetsCliOptions {
  manifest?: string;
  paper: string;
  bleed: string;
  cut: string;
  rows: number;
  columns: number;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('must be an integer');
  }
  return Number.parseInt(value, 10);
}

export function buildPrintSheetsCommand(): Command {
  return new Command('print-sheets')
    .description('Lay out a deck list on print-ready PDF sheets')
    .argument('<deck_list>', 'text file with one `[<count>[x]] <ref>` per line')
    .argument('<output>', 'PDF file to write')
    .option('--manifest <path>', 'compiled manifest (default: MANIFEST_PATH)')
    .addOption(new Option('--paper <size>', 'paper size').choices(['a4', 'letter']).default('a4'))
    .addOption(
      new Option('--bleed <mode>', 'bleed around each card').choices(['none', 'narrow', 'medium', 'wide']).default('none')
    )
    .addOption(new Option('--cut <indicator>', 'cut guides').choices(['marks', 'lines', 'none']).default('marks'))
    .addOption(new Option('--rows <n>', 'rows per page').argParser(parseInteger).default(3))
    .addOption(new Option('--columns <n>', 'columns per page').argParser(parseInteger).default(3))
    .exitOverride();
}

export interface PrintSheetsDeps {
  fetchImpl?: FetchLike;
}

export async function runPrintSheetsCli(argv: ReadonlyArray<string>, deps: PrintSheetsDeps = {}): Promise<number> {
  const command = buildPrintSheetsCommand();
  const controller = new AbortController();
  const onSigint = () => {
    logWarn(TAG, 'Interrupted; aborting sheet generation');
    controller.abort();
  };

  command.action(async (deckListPath: string, outputPath: string, options: PrintSheetsCliOptions) => {
    const profile = buildProfile(
      profileOptionsSchema.parse({
        paper: options.paper,
        bleed: options.bleed,
        cut: options.cut,
        rows: options.rows,
        columns: options.columns,
      })
    );

    let deckList: string;
    try {
      deckList = await fs.promises.readFile(deckListPath, 'utf-8');
    } catch (err) {
      throw new LoadError(`cannot read deck list ${deckListPath}`, { ids: [deckListPath], cause: err });
    }

    const catalog = await Catalog.load(options.manifest ?? getEnv().MANIFEST_PATH);
    const selection = new SelectionBuilder(catalog);
    selection.parseDeckList(deckList);

    const result = await writeSheets(selection.entries, outputPath, {
      profile,
      signal: controller.signal,
      fetchImpl: deps.fetchImpl,
    });
    if (result.failed.length > 0) {
      logWarn(TAG, `Placeholders used for: ${result.failed.join(', ')}`);
    }
    logInfo(TAG, `Wrote ${result.pages} pages (${selection.size} cards) to ${outputPath}`);
  });

  process.once('SIGINT', onSigint);
  try {
    await command.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    logError(TAG, describeError(err));
    return 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
