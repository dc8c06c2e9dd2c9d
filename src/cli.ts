#!/usr/bin/env node

import { readFileSync } from 'fs';
import chalk from 'chalk';
import { createProgram } from './cli/program.js';

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

const program = createProgram(readVersion());

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
