/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { VerifierAgent, fallbackChecks, parseChecks } from './verifier.js';
import { AgentEventBus } from '../event-bus/bus.js';
import { LlmGateway } from '../core/llmGateway.js';
import type { VerifyFallbackPolicy } from '../config/config.js';
import type { Solution } from '../interfaces/reasoning.js';
import {
  PASSING_CHECKS,
  checksJson,
  createScriptedGenerator,
  createTestConfig,
  promptOfCall,
  type ScriptedReply,
} from '../utils/testHelpers.js';

const solution: Solution = {
  answer: '62',
  reasoning: '25 plus 37 is 62',
  intermediate_work: '25 + 37 = 62',
};

describe('parseChecks', () => {
  it('should read every check in order', () => {
    expect(parseChecks('```json\n' + checksJson(PASSING_CHECKS) + '\n```')).toEqual({
      ok: true,
      checks: PASSING_CHECKS,
    });
  });

  it('should accept an empty array', () => {
    expect(parseChecks('[]')).toEqual({ ok: true, checks: [] });
  });

  it('should fail when a check is missing a field', () => {
    const result = parseChecks('[{"check_name": "Logic Check", "passed": true}]');
    expect(result).toEqual({ ok: false, error: "Check 1: (root) must have required property 'details'" });
  });

  it('should fail when a check has an extra field', () => {
    const result = parseChecks(
      '[{"check_name": "Logic Check", "passed": true, "details": "ok"}, {"check_name": "Units Check", "passed": true, "details": "ok", "severity": "low"}]',
    );
    expect(result).toEqual({ ok: false, error: 'Check 2: (root) must NOT have additional properties' });
  });

  it('should fail when passed is not a boolean', () => {
    const result = parseChecks('[{"check_name": "Logic Check", "passed": "yes", "details": "ok"}]');
    expect(result.ok).toBe(false);
  });

  it('should fail without a bracket pair', () => {
    expect(parseChecks('All checks passed.').ok).toBe(false);
  });
});

describe('fallbackChecks', () => {
  it('should fail closed under the strict policy even when the text says correct', () => {
    expect(fallbackChecks('The answer is correct.', 'strict')).toEqual([{
      check_name: 'Verification Error',
      passed: false,
      details: 'Could not parse verification properly. Raw response: The answer is correct.',
    }]);
  });

  it('should pass under the lenient policy when the text says correct', () => {
    expect(fallbackChecks('Everything looks CORRECT to me', 'lenient')).toEqual([{
      check_name: 'Basic Verification',
      passed: true,
      details: 'Verification response indicates correctness (JSON parsing failed but content seems valid)',
    }]);
  });

  it('should not pass on a stray digit under the lenient policy', () => {
    const [check] = fallbackChecks('Result: 4', 'lenient');
    expect(check.passed).toBe(false);
    expect(check.check_name).toBe('Verification Error');
  });

  it('should quote at most 200 characters of the raw reply', () => {
    const raw = 'y'.repeat(300);
    const [check] = fallbackChecks(raw, 'strict');
    expect(check.details).toBe(`Could not parse verification properly. Raw response: ${'y'.repeat(200)}`);
  });
});

describe('VerifierAgent', () => {
  let bus: AgentEventBus;

  function makeVerifier(replies: ScriptedReply[], policy?: VerifyFallbackPolicy) {
    const scripted = createScriptedGenerator(replies);
    const verifier = new VerifierAgent(
      bus,
      new LlmGateway(scripted.generator, createTestConfig()),
      policy,
    );
    return { verifier, ...scripted };
  }

  beforeEach(() => {
    bus = new AgentEventBus();
  });

  it('should embed the solution and return the parsed checks', async () => {
    const { verifier, generateContent } = makeVerifier([checksJson(PASSING_CHECKS)]);

    const result = await verifier.run({ input: { question: 'What is 25 + 37?', solution }, attempt: 0 });

    expect(result.output).toEqual({ checks: PASSING_CHECKS, parsed: true });
    const prompt = promptOfCall(generateContent, 0);
    expect(prompt).toContain('Answer: 62\nReasoning: 25 plus 37 is 62\nWork: 25 + 37 = 62');
  });

  it('should log a diagnostic and fail closed on an unreadable reply by default', async () => {
    const { verifier } = makeVerifier(['Looks correct overall.']);

    const result = await verifier.run({ input: { question: 'q', solution }, attempt: 0 });

    expect(result.output).toEqual({
      checks: [{
        check_name: 'Verification Error',
        passed: false,
        details: 'Could not parse verification properly. Raw response: Looks correct overall.',
      }],
      parsed: false,
    });
    const logs = bus.history().filter((e) => e.type === 'log').map((e) => e.payload);
    expect(logs).toHaveLength(1);
    expect(String(logs[0])).toMatch(/^Warning: Could not parse verification JSON/);
  });

  it('should apply the lenient policy when configured', async () => {
    const { verifier } = makeVerifier(['Looks correct overall.'], 'lenient');

    const result = await verifier.run({ input: { question: 'q', solution }, attempt: 0 });

    expect(result.output?.checks).toEqual([{
      check_name: 'Basic Verification',
      passed: true,
      details: 'Verification response indicates correctness (JSON parsing failed but content seems valid)',
    }]);
  });

  it('should route malformed checks into the fallback', async () => {
    const { verifier } = makeVerifier(['[{"name": "Logic", "ok": true}]']);

    const result = await verifier.run({ input: { question: 'q', solution }, attempt: 0 });

    expect(result.output?.parsed).toBe(false);
    expect(result.output?.checks[0].check_name).toBe('Verification Error');
  });
});
