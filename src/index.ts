#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import { createProgram } from './cli/program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`\nUnexpected error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
