/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  GoogleGenAI,
  type GenerateContentParameters,
  type GenerateContentResponse,
} from '@google/genai';
import type { Config } from '../config/config.js';

/**
 * Interface abstracting the core functionalities for generating content.
 */
export interface ContentGenerator {
  generateContent(
    request: GenerateContentParameters,
  ): Promise<GenerateContentResponse>;
}

export function createContentGenerator(config: Config): ContentGenerator {
  const googleGenAI = new GoogleGenAI({ apiKey: config.getApiKey() });
  return googleGenAI.models;
}
