#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { mapCliError } from './errorMapping.js';
import { createProgram } from './program.js';

dotenv.config();

async function main(): Promise<void> {
  const program = createProgram(loadConfig());
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const response = mapCliError(error);
  console.error(`Error [${response.code}]: ${response.message}`);
  if (response.details) {
    console.error(JSON.stringify(response.details, null, 2));
  }
  process.exit(response.exitCode);
});
