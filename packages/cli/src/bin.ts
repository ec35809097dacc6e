#!/usr/bin/env node
import pc from 'picocolors';
import { errorMessage } from '@fnconfig/core';
import { createProgram } from './program.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  console.error(pc.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 1;
}
