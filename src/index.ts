#!/usr/bin/env node
/**
 * ESP32 Merge MCP Server - Main Entry Point
 */

import { startServer } from './server.js';

startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
