/**
 * Post-build entry: what the build system calls once the firmware binary exists
 */

import { CONFIG, ERROR_MESSAGES } from './config.js';
import { ExternalToolFailure } from './utils/error-handler.js';
import { CommandExecutor } from './utils/executor.js';
import { PackageToolLocator } from './utils/tool-locator.js';
import { runMergeHook } from './utils/merge-hook.js';
import type { CommandRunner, LogSink, ToolLocator } from './types.js';

export interface PostBuildOptions {
  argv: string[];
  buildDir?: string;
  pythonPath?: string;
  locator?: ToolLocator;
  runner?: CommandRunner;
  log?: LogSink;
  logError?: LogSink;
}

export const EXIT_OK = 0;
export const EXIT_MERGE_FAILED = 1;
export const EXIT_USAGE = 2;

/**
 * Run the merge hook for a finished build and map the outcome to a process exit code
 */
export async function runPostBuild(options: PostBuildOptions): Promise<number> {
  const log = options.log ?? console.log;
  const logError = options.logError ?? console.error;

  const buildDir = options.argv[0] ?? options.buildDir ?? CONFIG.BUILD_DIR;
  if (!buildDir) {
    logError(ERROR_MESSAGES.BUILD_DIR_MISSING);
    logError('Usage: esp32-merge-hook <build-dir>');
    return EXIT_USAGE;
  }

  try {
    await runMergeHook({
      buildDir,
      pythonPath: options.pythonPath ?? CONFIG.PYTHON_PATH,
      locator: options.locator ?? new PackageToolLocator(),
      // Tool output goes straight to the build log
      runner: options.runner ?? CommandExecutor.runner({ capture: false }),
      log
    });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ExternalToolFailure) {
      logError(error.message);
      return EXIT_MERGE_FAILED;
    }
    throw error;
  }
}
