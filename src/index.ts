#!/usr/bin/env node

/**
 * timetree
 *
 * Personal time tracking over a hierarchy of projects, as a command-line tool
 * and as an MCP server (`timetree mcp`).
 */

import { createProgram } from './cli/program.js';
import { logger } from './utils/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Fatal error', error);
    process.exit(1);
  });
