/**
 * Reports which merge inputs and outputs are present in a build directory
 */

import * as fs from 'fs/promises';
import { formatBytes } from './formatter.js';
import { resolveArtifactPaths } from './merge-hook.js';
import type { ArtifactStatus } from '../types.js';

// ENOTDIR: the build directory itself is a file
const MISSING_CODES = ['ENOENT', 'ENOTDIR'];

function missing(role: ArtifactStatus['role'], filePath: string): ArtifactStatus {
  return { role, path: filePath, exists: false, sizeBytes: 0, sizeHuman: '-' };
}

async function statArtifact(role: ArtifactStatus['role'], filePath: string): Promise<ArtifactStatus> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return missing(role, filePath);
    }
    return {
      role,
      path: filePath,
      exists: true,
      sizeBytes: stats.size,
      sizeHuman: formatBytes(stats.size)
    };
  } catch (error) {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string' && MISSING_CODES.includes(error.code)) {
      return missing(role, filePath);
    }
    throw error;
  }
}

export async function inspectArtifacts(buildDir: string): Promise<ArtifactStatus[]> {
  const paths = resolveArtifactPaths(buildDir);

  return Promise.all([
    statArtifact('bootloader', paths.bootloader),
    statArtifact('partitions', paths.partitions),
    statArtifact('app', paths.app),
    statArtifact('output', paths.output)
  ]);
}
