#!/usr/bin/env node

import { AskCLI } from './cli/AskCLI';
import { describeFault } from './client/QueryResult';

async function main(): Promise<void> {
  const cli = new AskCLI();

  try {
    // Pass all arguments except 'node' and script name
    const exitCode = await cli.run(process.argv.slice(2));
    process.exit(exitCode);
  } catch (error: unknown) {
    process.stderr.write(`Error: ${describeFault(error)}\n`);
    process.exit(1);
  }
}

void main();
