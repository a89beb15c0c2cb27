#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { createLogger } from '../services/logger/index.js';
import { runInteractive, runWithArgument } from '../cli/session.js';
import type { Prompt } from '../cli/session.js';

const logger = createLogger('beans-cli');

async function main(): Promise<void> {
  const [arg] = process.argv.slice(2);
  const print = (text: string) => stdout.write(`${text}\n`);

  if (arg !== undefined) {
    process.exitCode = runWithArgument(arg, print);
    return;
  }

  const rl = createInterface({ input: stdin, output: stdout });
  const prompt: Prompt = { question: (query) => rl.question(query), print };

  try {
    await runInteractive(prompt);
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  logger.error({ err: error }, 'beans-cli failed');
  process.exitCode = 1;
});
