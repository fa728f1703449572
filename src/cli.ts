#!/usr/bin/env node
/**
 * esp32-merge-hook - post-build command line entry
 */

import { runPostBuild } from './post-build.js';

runPostBuild({ argv: process.argv.slice(2) })
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Post-build merge crashed:', error);
    process.exit(1);
  });
