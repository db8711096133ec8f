#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { createAssistant, type Assistant } from './bootstrap.js';
import { GREETING_REPLY } from './core/composers.js';
import { isAssistantError } from './core/errors.js';
import type { ReplyKind } from './core/router.js';
import { createLogger } from './util/logging.js';

const FRAME_BAR = '─'.repeat(44);

type Styler = (value: string) => string;

const identity: Styler = (value: string) => value;

interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  const prefixed = lines
    .map((line) => `${accent('│')} ${body(line)}`)
    .join('\n');
  return {
    top: accent(topPlain),
    body: prefixed,
    bottom: accent(bottomPlain),
  };
}

const ACCENTS: Record<ReplyKind, Styler> = {
  lookup: chalk.greenBright,
  no_match: chalk.yellow,
  chat: chalk.greenBright,
  fallback: chalk.red,
  clarify: chalk.yellow,
  greeting: chalk.cyan,
  reset: chalk.cyan,
  history_search: chalk.magenta,
};

function printBlock(block: BlockParts): void {
  console.log();
  console.log(block.top);
  console.log(block.body);
  console.log(block.bottom);
  console.log();
}

async function main() {
  // CLI stays quiet unless asked otherwise
  const log = createLogger({ level: process.env.LOG_LEVEL ?? 'warn' });
  const userId = process.env.CLI_USER_ID || 'local';

  let assistant: Assistant;
  try {
    assistant = await createAssistant({ log });
  } catch (error) {
    const message = isAssistantError(error) ? error.message : String(error);
    console.error(chalk.red(`Cannot start: ${message}`));
    process.exit(1);
  }

  console.log(chalk.yellow.bold(`Store finder: ${assistant.catalog.size} stores loaded`));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.white(GREETING_REPLY));
  console.log(chalk.red('exit (quit)'));
  console.log(chalk.gray('─'.repeat(60)));

  const rl = readline.createInterface({ input, output });
  try {
    while (true) {
      const q = await rl.question(chalk.blue.bold('You> '));
      if (q.trim().toLowerCase() === 'exit') break;
      if (!q.trim()) continue;

      const reply = await assistant.router.route(userId, q);
      printBlock(createBlock('Assistant', reply.text, ACCENTS[reply.kind], identity));
    }
  } finally {
    rl.close();
    assistant.close();
  }
}

if (require.main === module) {
  main().catch((e) => (console.error(e), process.exit(1)));
}
