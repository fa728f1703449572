/**
 * Merge Hook - combines bootloader, partition table and application into one image
 *
 * Runs after the firmware binary is built. The layout below assumes the default
 * ESP32 partition scheme; another scheme needs other offsets.
 */

import * as path from 'path';
import { CONFIG } from '../config.js';
import { ExternalToolFailure } from './error-handler.js';
import type {
  ArtifactPaths,
  FlashRegion,
  MergeHookContext,
  MergePlan,
  MergeResult
} from '../types.js';

// Order matters: regions go on the command line in this order
export const FLASH_LAYOUT: readonly FlashRegion[] = [
  { role: 'bootloader', offset: '0x1000', fileName: 'bootloader.bin' },
  { role: 'partitions', offset: '0x8000', fileName: 'partitions.bin' },
  { role: 'app', offset: '0x10000', fileName: 'firmware.bin' }
];

export const MERGED_FILE_NAME = 'firmware_merged.bin';

/**
 * Append a file name to the build directory as given. No normalisation:
 * `..` segments are left for the shell to resolve.
 */
function joinBuildPath(buildDir: string, fileName: string): string {
  if (buildDir === '' || buildDir.endsWith(path.sep) || buildDir.endsWith('/')) {
    return `${buildDir}${fileName}`;
  }
  return `${buildDir}${path.sep}${fileName}`;
}

/**
 * Join the fixed artifact names onto the build directory. No existence check.
 */
export function resolveArtifactPaths(buildDir: string): ArtifactPaths & { output: string } {
  const [bootloader, partitions, app] = FLASH_LAYOUT.map(region =>
    joinBuildPath(buildDir, region.fileName)
  );

  return {
    bootloader,
    partitions,
    app,
    output: joinBuildPath(buildDir, MERGED_FILE_NAME)
  };
}

export function createMergePlan(
  context: Pick<MergeHookContext, 'buildDir' | 'pythonPath' | 'locator'>
): MergePlan {
  const { output, ...artifacts } = resolveArtifactPaths(context.buildDir);

  return {
    buildDir: context.buildDir,
    pythonPath: context.pythonPath,
    toolPath: context.locator.resolveToolPath(CONFIG.ESPTOOL_PACKAGE),
    artifacts,
    output
  };
}

/**
 * Build the esptool merge_bin command line. Paths are quoted; interpreter and tool are not.
 */
export function buildMergeCommand(plan: MergePlan): string {
  const regions = FLASH_LAYOUT.map(
    region => `${region.offset} "${plan.artifacts[region.role]}"`
  );

  return [
    plan.pythonPath,
    plan.toolPath,
    '--chip',
    CONFIG.CHIP,
    'merge_bin',
    '-o',
    `"${plan.output}"`,
    ...regions
  ].join(' ');
}

export function interpretExitCode(command: string, exitCode: number, output: string): MergeResult {
  if (exitCode === 0) {
    return { status: 'success', command, output };
  }

  return {
    status: 'failure',
    command,
    exitCode,
    error: new ExternalToolFailure(command, exitCode)
  };
}

/**
 * Run the hook end to end. Throws ExternalToolFailure when the tool exits non-zero.
 */
export async function runMergeHook(context: MergeHookContext): Promise<Extract<MergeResult, { status: 'success' }>> {
  const plan = createMergePlan(context);
  const command = buildMergeCommand(plan);

  context.log(`Merging ESP32 firmware: ${command}`);

  const exitCode = await context.runner(command);
  const result = interpretExitCode(command, exitCode, plan.output);

  if (result.status === 'failure') {
    throw result.error;
  }

  return result;
}
