#!/usr/bin/env node
/**
 * Dispatcher executable entry point
 * Called by GitHub Actions (action.yml) or from the command line
 */

import { runAction } from './action.js';

runAction().catch(error => {
  console.error('Workflow dispatch failed:', error);
  process.exit(1);
});
