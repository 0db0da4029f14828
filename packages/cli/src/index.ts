#!/usr/bin/env tsx
import { exitCodeFor } from '@rebisect/shared';
import { createProgram, type GlobalOptions } from './program';
import { renderError } from './errors';

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts<GlobalOptions>();
    renderError(e, { json: opts.json, verbose: opts.verbose });
    process.exit(exitCodeFor(e));
  }
}

void main();
