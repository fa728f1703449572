/**
 * Error handling utility with actionable error messages
 */

import { ERROR_MESSAGES } from '../config.js';
import { ResponseFormatter } from './formatter.js';

/**
 * Raised when the external merge tool exits non-zero.
 * Tool missing, bad arguments, missing inputs and tool crashes all end up here.
 */
export class ExternalToolFailure extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr = '') {
    super(ERROR_MESSAGES.MERGE_FAILED);
    this.name = 'ExternalToolFailure';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ErrorHandler {
  /**
   * Handle and format errors with suggestions
   */
  static handle(error: unknown): string {
    if (error instanceof ExternalToolFailure) {
      return this.handleToolFailure(error);
    }

    if (error instanceof Error) {
      return this.handleError(error);
    }

    return ResponseFormatter.error(
      'An unknown error occurred',
      'Check logs for details'
    );
  }

  private static handleToolFailure(error: ExternalToolFailure): string {
    const details = [
      error.message,
      `Exit code: ${error.exitCode}`,
      `Command: ${error.command}`
    ];
    if (error.stderr) {
      details.push(`Tool output: ${error.stderr}`);
    }

    return ResponseFormatter.error(
      details.join('\n'),
      'Run check_build_artifacts() to confirm bootloader.bin, partitions.bin and firmware.bin exist, and check that esptool is installed for the interpreter in use'
    );
  }

  private static handleError(error: Error): string {
    const message = error.message;

    if (message.includes('shell')) {
      return ResponseFormatter.error(
        message,
        'The merge command is run through the system shell. Ensure /bin/sh (or cmd.exe on Windows) is available'
      );
    }

    return ResponseFormatter.error(message);
  }

  /**
   * Wrap async function with error handling
   */
  static async wrap<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new Error(this.handle(error));
    }
  }
}
