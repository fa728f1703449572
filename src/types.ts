/**
 * TypeScript type definitions for the ESP32 merge hook
 */

import type { ExternalToolFailure } from './utils/error-handler.js';

export type OutputFormat = 'markdown' | 'json';

export type DetailLevel = 'concise' | 'detailed';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
}

/**
 * Input images of the merge, each living directly in the build directory
 */
export interface ArtifactPaths {
  bootloader: string;
  partitions: string;
  app: string;
}

export type ArtifactRole = keyof ArtifactPaths;

export interface FlashRegion {
  role: ArtifactRole;
  offset: string;
  fileName: string;
}

export interface MergePlan {
  buildDir: string;
  pythonPath: string;
  toolPath: string;
  artifacts: ArtifactPaths;
  output: string;
}

/**
 * Resolves the executable path of a named external tool package
 */
export interface ToolLocator {
  resolveToolPath(packageId: string): string;
}

/**
 * Runs a command line and resolves to its exit code
 */
export type CommandRunner = (commandLine: string) => Promise<number>;

export type LogSink = (line: string) => void;

export interface MergeHookContext {
  buildDir: string;
  pythonPath: string;
  locator: ToolLocator;
  runner: CommandRunner;
  log: LogSink;
}

export type MergeResult =
  | { status: 'success'; command: string; output: string }
  | { status: 'failure'; command: string; exitCode: number; error: ExternalToolFailure };

export interface ArtifactStatus {
  role: ArtifactRole | 'output';
  path: string;
  exists: boolean;
  sizeBytes: number;
  sizeHuman: string;
}
