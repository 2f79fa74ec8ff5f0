#!/usr/bin/env node
/**
 * Proxy Sheets – Manifest Compiler CLI
 *
 * Usage: prepare <source_dataset_dir> <override_manifest.toml> <output_manifest>
 *                [--local-manifest <path>] [--local-output <path>]
 */

import { runPrepareCli } from '../src/cli/prepareCommand';

runPrepareCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
