#!/usr/bin/env tsx

import * as acorn from 'acorn';
import { readFile } from 'fs/promises';
import { createInterface } from 'readline';
import pkg from '../package.json' with { type: 'json' };
import { renderOutcome } from './render.ts';
import { ScriptRunner } from './script-runner.ts';

const args = process.argv.slice(2);
const json = args.includes('--json');
const files = args.filter(arg => arg !== '--json');

const globalContext = {
  console: {
    log: console.log,
    error: console.error,
    warn: console.warn,
    info: console.info,
  },
  setTimeout: setTimeout,
  clearTimeout: clearTimeout,
  setInterval: setInterval,
  clearInterval: clearInterval,
};

if (files.length === 0) {
  startREPL();
} else {
  const filename = files[0];

  try {
    const runner = new ScriptRunner(globalContext);
    const outcome = await runner.run(await readFile(filename, 'utf-8'));

    if (outcome.kind === 'exception') {
      console.error(renderOutcome(outcome, json));
      process.exit(1);
    }
    console.log(renderOutcome(outcome, json));
  } catch (error) {
    console.error(`Error executing file: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

/**
 * Input is incomplete when acorn gives up at the very end of the buffer
 */
function needsMoreInput(buffer: string): boolean {
  try {
    acorn.parse(buffer, {
      ecmaVersion: 'latest',
      sourceType: 'script',
    });
    return false;
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    const raisedAt: unknown = Reflect.get(error, 'raisedAt');
    return typeof raisedAt === 'number' && raisedAt >= buffer.length;
  }
}

/**
 * Starts an interactive Read-Eval-Print Loop with standard readline
 */
function startREPL() {
  console.log(`\nvaluetree REPL v${pkg.version}`);
  console.log('Type .exit or press Ctrl+C to exit\n');

  const runner = new ScriptRunner(globalContext);

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
    historySize: 1000,
  });

  let buffer = '';
  // submissions run one after another, in the order their lines arrived
  let pending: Promise<void> = Promise.resolve();

  rl.prompt();

  rl.on('line', line => {
    if (line.trim() === '.exit') {
      console.log('Exiting...');
      process.exit(0);
    }

    buffer += line;

    if (needsMoreInput(buffer)) {
      buffer += '\n';
      rl.setPrompt('... ');
      rl.prompt();
      return;
    }

    const submission = buffer;
    buffer = '';
    rl.setPrompt('> ');

    if (submission.trim() === '') {
      rl.prompt();
      return;
    }

    pending = pending
      .then(() => runner.run(submission))
      .then(outcome => {
        const text = renderOutcome(outcome, json);
        if (outcome.kind === 'exception') {
          console.error(text);
        } else {
          console.log(text);
        }
      })
      .catch((error: unknown) => {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      })
      .finally(() => {
        rl.prompt();
      });
  });

  rl.on('SIGINT', () => {
    console.log('\nExiting...');
    process.exit(0);
  });
}
