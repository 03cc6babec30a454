/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ReasoningPhase =
  | 'ENGINE'
  | 'PLANNER'
  | 'EXECUTOR'
  | 'VERIFIER'
  | 'GATEWAY';

export type PhaseLogger = (phase: ReasoningPhase, msg: string) => void;

const COLOR: Record<ReasoningPhase, string> = {
  ENGINE: '\x1b[36m',       // cyan
  PLANNER: '\x1b[35m',      // magenta
  EXECUTOR: '\x1b[33m',     // yellow
  VERIFIER: '\x1b[32m',     // green
  GATEWAY: '\x1b[31m',      // red
};

export function formatPhaseLine(phase: ReasoningPhase, msg: string, now = new Date()): string {
  const stamp = now.toISOString().split('T')[1].slice(0, 8);
  return `${COLOR[phase]}[${stamp}] [${phase}] ${msg}\x1b[0m`;
}

export const silentPhaseLogger: PhaseLogger = () => {};

/**
 * Debug lines for one engine. Disabled loggers drop everything, so each
 * engine follows its own Config rather than a process-wide switch.
 */
export function createPhaseLogger(
  enabled: boolean,
  // stderr only: stdout carries the JSON the CLI prints
  write: (line: string) => void = (line) => console.error(line),
): PhaseLogger {
  if (!enabled) return silentPhaseLogger;
  return (phase, msg) => write(formatPhaseLine(phase, msg));
}
