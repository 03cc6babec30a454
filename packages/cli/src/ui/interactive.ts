/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createInterface } from 'node:readline';
import { describeError, type AgentResponse, type Solver } from '@stepcheck/core';
import { formatRecord, formatResponse } from './display.js';

const QUESTION_PROMPT = '\nQuestion: ';
const SHOW_JSON_PROMPT = '\nShow full JSON? (y/n): ';
const QUIT_WORDS = new Set(['quit', 'exit', 'q']);

export interface InteractiveIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export const BANNER = [
  'Multi-Step Reasoning Agent (plan, execute, verify)',
  '='.repeat(50),
  "Type your question or 'quit' to exit.",
].join('\n');

/**
 * Reads questions line by line until quit or end of input. After each answer
 * the next line is read as the reply to "Show full JSON?".
 */
export async function runInteractive(
  solver: Solver,
  io: InteractiveIO = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const rl = createInterface({ input: io.input, output: io.output });
  const write = (text: string) => io.output.write(`${text}\n`);
  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  write(BANNER);
  rl.setPrompt(QUESTION_PROMPT);
  rl.prompt();

  let awaitingJsonReply: AgentResponse | undefined;
  try {
    for await (const line of rl) {
      const text = line.trim();

      if (awaitingJsonReply) {
        if (text.toLowerCase() === 'y') {
          write(formatRecord(awaitingJsonReply));
        }
        awaitingJsonReply = undefined;
        rl.setPrompt(QUESTION_PROMPT);
        rl.prompt();
        continue;
      }

      if (QUIT_WORDS.has(text.toLowerCase())) {
        write('Goodbye!');
        break;
      }
      if (!text) {
        rl.prompt();
        continue;
      }

      write('\nProcessing...\n');
      try {
        const response = await solver.solve(text);
        write(formatResponse(response));
        awaitingJsonReply = response;
        rl.setPrompt(SHOW_JSON_PROMPT);
      } catch (error) {
        write(`ERROR: ${describeError(error)}`);
      }
      rl.prompt();
    }
  } finally {
    if (!closed) rl.close();
  }
}
