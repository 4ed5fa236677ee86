#!/usr/bin/env node
/**
 * Home Dashboard - CLI Entry Point
 *
 * Starts the dashboard server.
 */

import { buildProgram, serve } from './program.js';

buildProgram(serve)
  .parseAsync(process.argv)
  .catch((error) => {
    console.error('Failed to start Home Dashboard:', error);
    process.exit(1);
  });
