#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from './cli.js';

// Handle graceful shutdown
process.on('SIGINT', () => {
  console.log('\n');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log('\n');
  process.exit(0);
});

createCLI()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
