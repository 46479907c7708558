#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from '../src/cli/index.js';

const program = createCLI();

program.parseAsync(process.argv).catch((err) => {
    console.error(chalk.red(`✗ ${(err as Error).message}`));
    process.exit(1);
});
