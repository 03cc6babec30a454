/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export all event bus types and implementations
export type {
  AgentEvent,
  AgentEventType,
  AgentEventPayloads,
  AgentEventHandler,
  ProgressPayload,
  ErrorPayload,
  AttemptStartPayload,
  AttemptEndPayload,
} from './types.js';
export { AgentType, AGENT_EVENT_TYPES } from './types.js';
export { AgentEventBus, type HandlerErrorReporter } from './bus.js';
export { startEventBusGateway, type EventBusGateway } from './wsGateway.js';
