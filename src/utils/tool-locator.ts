/**
 * Tool Locator - resolves where an installed tool package keeps its executable
 */

import * as path from 'path';
import { CONFIG } from '../config.js';
import type { ToolLocator } from '../types.js';

export interface PackageToolLocatorOptions {
  /** Explicit esptool.py path; skips the package lookup. Present-but-undefined ignores ESPTOOL_PATH */
  esptoolPath?: string;
  /** Root holding packages/<id> (PlatformIO core dir) */
  coreDir?: string;
}

// Executable inside each known package directory
const PACKAGE_EXECUTABLES: Record<string, string> = {
  [CONFIG.ESPTOOL_PACKAGE]: CONFIG.ESPTOOL_SCRIPT
};

export class PackageToolLocator implements ToolLocator {
  private readonly esptoolPath: string | undefined;
  private readonly coreDir: string;

  constructor(options: PackageToolLocatorOptions = {}) {
    this.esptoolPath = 'esptoolPath' in options ? options.esptoolPath : CONFIG.ESPTOOL_PATH;
    this.coreDir = options.coreDir ?? CONFIG.PLATFORMIO_CORE_DIR;
  }

  /**
   * Get the install directory of a package
   */
  getPackageDir(packageId: string): string {
    return path.join(this.coreDir, 'packages', packageId);
  }

  /**
   * Resolve the executable of a package. Existence is not checked:
   * a missing tool shows up as a failing command.
   */
  resolveToolPath(packageId: string): string {
    if (packageId === CONFIG.ESPTOOL_PACKAGE && this.esptoolPath) {
      return this.esptoolPath;
    }

    const executable = PACKAGE_EXECUTABLES[packageId];
    if (executable === undefined) {
      throw new Error(`Unknown tool package: ${packageId}`);
    }

    return path.join(this.getPackageDir(packageId), executable);
  }
}
