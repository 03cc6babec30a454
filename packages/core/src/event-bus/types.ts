/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Check, Solution } from '../interfaces/reasoning.js';

/** identity of a reasoning stage */
export enum AgentType {
  PLANNER = 'PLANNER',
  EXECUTOR = 'EXECUTOR',
  VERIFIER = 'VERIFIER',
}

export interface AgentIdPayload {
  id: AgentType;
}

export interface ProgressPayload {
  agent: AgentType;
  attempt: number;         // zero-based attempt index
  percent: number;         // rounded integer 0-100
}

export interface AttemptStartPayload {
  attempt: number;
  maxAttempts: number;
}

export interface AttemptEndPayload {
  attempt: number;
  plan: string;
  solution: Solution;
  checks: Check[];
  passed: boolean;
}

export interface ErrorPayload {
  agent: AgentType | 'GATEWAY' | 'ENGINE';
  message: string;         // human-readable summary
  details?: string;        // stack or raw model text
}

/** Payload carried by each event type. */
export interface AgentEventPayloads {
  log: string;
  progress: ProgressPayload;
  'agent-start': AgentIdPayload;
  'agent-end': AgentIdPayload;
  'attempt-start': AttemptStartPayload;
  'attempt-end': AttemptEndPayload;
  error: ErrorPayload;
}

export type AgentEventType = keyof AgentEventPayloads;

export const AGENT_EVENT_TYPES: readonly AgentEventType[] = [
  'log',
  'progress',
  'agent-start',
  'agent-end',
  'attempt-start',
  'attempt-end',
  'error',
];

export interface AgentEvent<K extends AgentEventType = AgentEventType> {
  ts: number;
  type: K;
  payload: AgentEventPayloads[K];
}

export type AgentEventHandler<K extends AgentEventType> = (
  evt: AgentEvent<K>,
) => void;
