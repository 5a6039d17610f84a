#!/usr/bin/env node
/**
 * Dice MCP server CLI
 * Serves over stdio by default; see `dice-mcp --help` for the other commands.
 */

import { createProgram } from './commands.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    process.stderr.write(
      `dice-mcp failed: ${error instanceof Error ? error.message : String(error)}\n`
    );
    process.exit(1);
  }
}

void main();
