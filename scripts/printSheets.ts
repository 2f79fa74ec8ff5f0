#!/usr/bin/env node
/**
 * Proxy Sheets – Sheet Printing CLI
 *
 * Usage: print-sheets <deck_list> <output.pdf> [--manifest <path>] [--paper a4|letter]
 *                     [--bleed none|narrow|medium|wide] [--cut marks|lines|none]
 *                     [--rows <n>] [--columns <n>]
 */

import { runPrintSheetsCli } from '../src/cli/printSheetsCommand';

runPrintSheetsCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
