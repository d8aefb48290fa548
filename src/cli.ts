#!/usr/bin/env node
/**
 * Interactive travel assistant chat.
 *
 * Run with:
 *   npx tsx src/cli.ts
 *
 * Environment variables: see .env.example
 */

import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import * as readline from 'node:readline/promises';
import { createTravelAssistant } from './app.js';
import { runChat } from './chat-loop.js';
import { loadConfig } from './config.js';
import { configureLogging, errorMessage } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, file: config.logFile });

  const assistant = createTravelAssistant(config);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(`${config.destination.city} Travel Assistant`);
  console.log("Type 'quit' to exit");
  console.log();

  try {
    // One conversation per run
    await runChat(
      { ask: (prompt) => rl.question(prompt), print: (line) => console.log(line) },
      assistant,
      randomUUID()
    );
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
