/**
 * Command execution utility for the external merge tool
 */

import { spawn } from 'child_process';
import { ERROR_MESSAGES } from '../config.js';
import type { CommandResult, CommandRunner } from '../types.js';

export interface ExecuteOptions {
  /** Collect output instead of passing it through to this process */
  capture?: boolean;
}

export class CommandExecutor {
  /**
   * Run a command line through the system shell and wait for it to exit.
   * There is no timeout: the tool's own runtime bounds the wait.
   */
  static async run(commandLine: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const capture = options.capture ?? false;

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let isSettled = false;

      const child = spawn(commandLine, {
        shell: true,
        env: process.env,
        stdio: capture ? 'pipe' : 'inherit'
      });

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (exitCode, signal) => {
        if (isSettled) return;
        isSettled = true;

        // Killed by a signal: no exit code, still a failure
        const code = exitCode ?? (signal ? 1 : 0);
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code,
          success: code === 0
        });
      });

      child.on('error', (error) => {
        if (isSettled) return;
        isSettled = true;

        if (error.message.includes('ENOENT')) {
          reject(new Error(ERROR_MESSAGES.SHELL_NOT_FOUND(commandLine)));
          return;
        }
        reject(error);
      });
    });
  }

  /**
   * Adapt run() to the exit-code-only runner the merge hook consumes.
   * The last result stays readable through onResult for callers that report tool output.
   */
  static runner(
    options: ExecuteOptions & { onResult?: (result: CommandResult) => void } = {}
  ): CommandRunner {
    return async (commandLine: string) => {
      const result = await this.run(commandLine, options);
      options.onResult?.(result);
      return result.exitCode;
    };
  }
}
