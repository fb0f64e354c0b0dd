import path from 'path';
import { resolveConfigPath } from './config/config.js';
import { defaultOutputPath } from './config/defaults.js';
import { SweepOrchestrator } from './scanner/orchestrator.js';
import type { SweepSummary } from './scanner/types.js';
import { isAccessible, isDirectory } from './utils/fs-utils.js';
import { logger } from './utils/logger.js';

export interface FileSweepOptions {
  root: string;
  configPath?: string;
  outputPath?: string;
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Checks the run's preconditions, throwing with an operator-facing message
 */
export async function validateInputs(root: string, configPath: string): Promise<void> {
  if (!(await isAccessible(root))) {
    throw new Error(`Search root directory does not exist: ${root}`);
  }

  if (!(await isDirectory(root))) {
    throw new Error(`Search root is not a directory: ${root}`);
  }

  if (!(await isAccessible(configPath))) {
    throw new Error(`Config file not found: ${configPath}`);
  }
}

/**
 * Main entry point for a sweep
 */
export async function fileSweep(options: FileSweepOptions): Promise<SweepSummary> {
  if (options.debug) {
    logger.setDebug(true);
  }

  const configPath = resolveConfigPath(options.configPath);
  const outputPath = options.outputPath ?? defaultOutputPath();

  await validateInputs(options.root, configPath);

  logger.debug(`Root: ${path.resolve(options.root)}`);
  logger.debug(`Config: ${configPath}`);
  logger.debug(`Output: ${path.resolve(outputPath)}`);

  const orchestrator = new SweepOrchestrator({
    root: options.root,
    configPath,
    outputPath,
    verbose: options.verbose ?? false
  });

  return orchestrator.run();
}
