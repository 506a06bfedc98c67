#!/usr/bin/env node

import chalk from 'chalk';

import packageJson from '../../package.json' with { type: 'json' };
import { createProgram } from '../cli/program.js';
import { config } from '../config/index.js';
import { createPgStores } from '../storage/index.js';

const program = createProgram(
  {
    config,
    openStores: () => createPgStores(config.databaseUrl),
    write: (text) => console.log(text),
    status: (text) => console.error(text),
  },
  packageJson.version
);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red.bold('\nAnalysis failed:\n'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
