#!/usr/bin/env node

import { errorMessage } from '@taskpilot/core';
import chalk from 'chalk';

import { createProgram } from './program.js';

try {
  await createProgram().parseAsync();
} catch (error) {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = 1;
}
