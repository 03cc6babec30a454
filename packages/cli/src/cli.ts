/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  API_KEY_ENV,
  ConfigError,
  ReasoningEngine,
  createPhaseLogger,
  loadConfigFromEnv,
  startEventBusGateway,
  type Config,
  type ContentGenerator,
  type EventBusGateway,
} from '@stepcheck/core';
import { USAGE, UsageError, parseCliArgs, type CliOptions } from './args.js';
import { formatRecord } from './ui/display.js';
import { runInteractive } from './ui/interactive.js';
import { loadTestSuite } from './batch/testCases.js';
import { formatSummary, runTestSuite, saveResults, summarizeResults } from './batch/runner.js';
import { getStartupWarnings } from './utils/startupWarnings.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
/** The question was answered but verification never passed. */
export const EXIT_UNVERIFIED = 2;

export interface MainDeps {
  env?: NodeJS.ProcessEnv;
  /** Replaces the Gemini client, mainly for tests. */
  contentGenerator?: ContentGenerator;
}

function loadConfig(options: CliOptions, env: NodeJS.ProcessEnv): Config | undefined {
  try {
    return loadConfigFromEnv(env, options.config);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(`ERROR: ${error.message}`);
    if (error.message.startsWith(API_KEY_ENV)) {
      console.error(`Set it with: export ${API_KEY_ENV}=<your key>, or put it in a .env file.`);
    }
    return undefined;
  }
}

async function runBatch(engine: ReasoningEngine, options: CliOptions): Promise<number> {
  const suite = await loadTestSuite();
  console.log('='.repeat(70));
  console.log('MULTI-STEP REASONING AGENT - TEST SUITE');
  console.log('='.repeat(70));

  const results = await runTestSuite(engine, suite, options.category);
  for (const line of formatSummary(summarizeResults(results))) {
    console.log(line);
  }
  await saveResults(results, options.out);
  console.log(`\nDetailed results saved to: ${options.out}`);
  return EXIT_OK;
}

/** Runs the CLI and resolves with the process exit code. */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    return EXIT_ERROR;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const config = loadConfig(options, deps.env ?? process.env);
  if (!config) {
    return EXIT_ERROR;
  }

  for (const warning of await getStartupWarnings(options, config)) {
    console.error(warning);
  }

  const engine = new ReasoningEngine(config, { contentGenerator: deps.contentGenerator });
  // Stage diagnostics, such as an unreadable verifier reply, are always shown.
  engine.bus.subscribe('log', (event) => console.error(event.payload));

  let gateway: EventBusGateway | undefined;
  if (options.eventsPort !== undefined) {
    gateway = startEventBusGateway(
      engine.bus,
      options.eventsPort,
      createPhaseLogger(config.getDebugMode()),
    );
    const port = await gateway.ready();
    console.error(`Streaming engine events on ws://localhost:${port}`);
  }

  try {
    if (options.batch) {
      return await runBatch(engine, options);
    }
    if (options.question !== undefined) {
      const response = await engine.solve(options.question);
      console.log(formatRecord(response));
      return response.status === 'success' ? EXIT_OK : EXIT_UNVERIFIED;
    }
    await runInteractive(engine);
    return EXIT_OK;
  } finally {
    await gateway?.close();
  }
}
