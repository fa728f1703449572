/**
 * Configuration constants for the ESP32 merge hook
 */

import * as os from 'os';
import * as path from 'path';

export const CONFIG = {
  // Toolchain
  PYTHON_PATH: process.env.PYTHONEXE || 'python3',
  PLATFORMIO_CORE_DIR: process.env.PLATFORMIO_CORE_DIR || path.join(os.homedir(), '.platformio'),
  ESPTOOL_PATH: process.env.ESPTOOL_PATH || undefined,
  ESPTOOL_PACKAGE: 'tool-esptoolpy',
  ESPTOOL_SCRIPT: 'esptool.py',

  // Build
  BUILD_DIR: process.env.BUILD_DIR || undefined,
  CHIP: 'esp32',

  // Response formatting
  CHARACTER_LIMIT: parseInt(process.env.CHARACTER_LIMIT || '25000', 10)
} as const;

export const ERROR_MESSAGES = {
  MERGE_FAILED: 'Failed to merge ESP32 binaries',

  BUILD_DIR_MISSING:
    'No build directory given. Pass it as the first argument or set BUILD_DIR.',

  SHELL_NOT_FOUND: (cmd: string) =>
    `Could not start a shell to run: ${cmd}`
} as const;
