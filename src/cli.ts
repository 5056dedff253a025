#!/usr/bin/env node

import { parseArgs, USAGE, type CliArgs } from './options';
import { readConfig, resolveOptions, type FileConfig } from './config';
import { resolveInputs, type ResolvedInputs } from './files';
import { processImageFiles } from './processor';
import { WatermarkEngine } from './lib/engine';
import { createConsoleLogger } from './logger';
import { UsageError, errorMessage } from './errors';

export async function run(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.inputs.length === 0) {
    console.error(USAGE);
    return 1;
  }

  let fileConfig: FileConfig = {};
  if (args.configPath !== undefined) {
    try {
      fileConfig = readConfig(args.configPath);
    } catch (error) {
      console.error(`Error reading config ${args.configPath}: ${errorMessage(error)}`);
      return 1;
    }
  }

  const options = resolveOptions(args.flags, fileConfig);
  const logger = createConsoleLogger(options);

  // The engine loads the reference images once for the whole run
  let engine: WatermarkEngine;
  try {
    engine = await WatermarkEngine.create();
  } catch (error) {
    logger.error(`Error initializing engine: ${errorMessage(error)}`);
    return 1;
  }

  let resolved: ResolvedInputs;
  try {
    resolved = await resolveInputs(args.inputs, options.suffix);
  } catch (error) {
    logger.error(`Error accessing path: ${errorMessage(error)}`);
    return 1;
  }

  const { files, scanned } = resolved;
  if (files.length === 0) {
    logger.error('No image files found');
    return 1;
  }
  if (scanned) {
    logger.info(`Found ${files.length} image(s) to process`);
  }

  const summary = await processImageFiles(engine, files, options, logger);
  logger.info(`Successfully processed ${summary.succeeded}/${summary.total} image(s)`);

  return summary.failed > 0 ? 1 : 0;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
