#!/usr/bin/env node
import { CommanderError } from 'commander';
import { errorMessage } from '../core/errors.js';
import { ReadlinePrompter } from './prompter.js';
import { buildProgram } from './program.js';

const io = new ReadlinePrompter();
const program = buildProgram({ io });

program
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    // help and version arrive here with exit code 0
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  })
  .finally(() => io.close());
