/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  AgentEvent,
  AgentEventHandler,
  AgentEventPayloads,
  AgentEventType,
} from './types.js';

/** Called when a subscriber throws; the other subscribers still run. */
export type HandlerErrorReporter = (type: AgentEventType, error: unknown) => void;

const reportToStderr: HandlerErrorReporter = (type, error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[event-bus] ${type} subscriber failed: ${message}`);
};

type HandlerTable = {
  [K in AgentEventType]: Array<AgentEventHandler<K>>;
};

export class AgentEventBus {
  private _events: AgentEvent[] = [];
  private _handlers: HandlerTable = {
    log: [],
    progress: [],
    'agent-start': [],
    'agent-end': [],
    'attempt-start': [],
    'attempt-end': [],
    error: [],
  };
  private readonly _maxEvents: number;
  private readonly _onHandlerError: HandlerErrorReporter;

  constructor(maxEvents = 1000, onHandlerError: HandlerErrorReporter = reportToStderr) {
    this._maxEvents = maxEvents;
    this._onHandlerError = onHandlerError;
  }

  subscribe<K extends AgentEventType>(
    type: K,
    h: AgentEventHandler<K>,
  ): () => void {
    const handlers: Array<AgentEventHandler<K>> = this._handlers[type];
    handlers.push(h);

    // Return unsubscribe function
    return () => {
      const index = handlers.indexOf(h);
      if (index > -1) {
        handlers.splice(index, 1);
      }
    };
  }

  publish<K extends AgentEventType>(evt: AgentEvent<K>): void {
    this._events.push(evt);
    if (this._events.length > this._maxEvents) {
      this._events.shift();
    }

    // Handlers run synchronously; copy so unsubscribing inside a handler is safe.
    // A throwing handler never reaches the publisher.
    const handlers: Array<AgentEventHandler<K>> = this._handlers[evt.type];
    for (const handler of [...handlers]) {
      try {
        handler(evt);
      } catch (error) {
        this._onHandlerError(evt.type, error);
      }
    }
  }

  /** Shorthand for publishing an event stamped with the current time. */
  emit<K extends AgentEventType>(type: K, payload: AgentEventPayloads[K]): void {
    this.publish({ ts: Date.now(), type, payload });
  }

  history(limit?: number): AgentEvent[] {
    if (limit === undefined) {
      return [...this._events];
    }
    return this._events.slice(-limit);
  }
}
