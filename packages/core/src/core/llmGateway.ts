/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { GenerateContentConfig } from '@google/genai';
import type { Config } from '../config/config.js';
import type { AgentEventBus } from '../event-bus/bus.js';
import type { ContentGenerator } from './contentGenerator.js';
import { delay, describeError, isRateLimitError } from '../utils/recovery.js';
import { createPhaseLogger, type PhaseLogger } from '../utils/phaseLogger.js';

/** Sampling settings used for every call; not a per-call knob. */
export const GENERATION_CONFIG = {
  temperature: 1.0,
  topP: 0.95,
  topK: 40,
  maxOutputTokens: 2048,
} as const satisfies GenerateContentConfig;

export const CONTENT_BLOCKED_MARKER =
  'Error: Content was blocked by safety filters.';
export const RATE_LIMIT_MARKER =
  'Error: Rate limit exceeded. Please wait a moment and try again.';
export const LLM_ERROR_PREFIX = 'Error calling LLM: ';

const ERROR_MARKERS = [CONTENT_BLOCKED_MARKER, RATE_LIMIT_MARKER];

/** True when `text` is one of the markers the gateway returns instead of throwing. */
export function isGatewayError(text: string): boolean {
  return ERROR_MARKERS.includes(text) || text.startsWith(LLM_ERROR_PREFIX);
}

/**
 * Thin wrapper over the Gemini content generator.
 *
 * `call` never rejects: blocked prompts, rate limits and transport failures all
 * come back as marker strings, so callers treat the result as ordinary model
 * text that may or may not parse.
 */
export class LlmGateway {
  private readonly log: PhaseLogger;

  constructor(
    private readonly generator: ContentGenerator,
    private readonly config: Config,
    private readonly bus?: AgentEventBus,
  ) {
    this.log = createPhaseLogger(config.getDebugMode());
  }

  async call(prompt: string, system = ''): Promise<string> {
    const fullPrompt = system ? `${system}\n\n${prompt}` : prompt;

    try {
      return await this.generate(fullPrompt);
    } catch (error) {
      if (!isRateLimitError(error)) {
        return this.fail(`${LLM_ERROR_PREFIX}${describeError(error)}`, error);
      }

      const backoff = this.config.getRateLimitBackoffMs();
      this.log('GATEWAY', `rate limited, retrying once in ${backoff} ms`);
      await delay(backoff);
      try {
        return await this.generate(fullPrompt);
      } catch (retryError) {
        return this.fail(RATE_LIMIT_MARKER, retryError);
      }
    }
  }

  private async generate(fullPrompt: string): Promise<string> {
    const response = await this.generator.generateContent({
      model: this.config.getModel(),
      contents: fullPrompt,
      config: { ...GENERATION_CONFIG },
    });

    if (response.promptFeedback?.blockReason) {
      this.log('GATEWAY', `prompt blocked: ${response.promptFeedback.blockReason}`);
      return CONTENT_BLOCKED_MARKER;
    }

    const text = response.text;
    if (text === undefined) {
      throw new Error('Model returned no text');
    }
    return text;
  }

  private fail(marker: string, error: unknown): string {
    this.log('GATEWAY', `${marker} (${describeError(error)})`);
    this.bus?.emit('error', {
      agent: 'GATEWAY',
      message: marker,
      details: error instanceof Error ? error.stack : String(error),
    });
    return marker;
  }
}
