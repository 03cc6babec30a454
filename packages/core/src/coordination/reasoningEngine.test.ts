/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ReasoningEngine,
  UNVERIFIED_ANSWER,
  allChecksPassed,
  createReasoningEngine,
  summarizeFailures,
} from './reasoningEngine.js';
import { AgentEventBus } from '../event-bus/bus.js';
import { ConfigError, type ConfigParameters } from '../config/config.js';
import { LlmGateway, RATE_LIMIT_MARKER } from '../core/llmGateway.js';
import type { Check } from '../interfaces/reasoning.js';
import {
  FAILING_CHECKS,
  PASSING_CHECKS,
  SOLUTION_JSON,
  checksJson,
  createScriptedGenerator,
  createTestConfig,
  promptOfCall,
  type ScriptedReply,
} from '../utils/testHelpers.js';

/** Plan, solution and verification replies for one attempt. */
function attemptReplies(checks: Check[], plan = '1. Add\n2. Verify'): ScriptedReply[] {
  return [plan, SOLUTION_JSON, checksJson(checks)];
}

function makeEngine(replies: ScriptedReply[], overrides: ConfigParameters = {}) {
  const scripted = createScriptedGenerator(replies);
  const bus = new AgentEventBus();
  const engine = new ReasoningEngine(createTestConfig(overrides), {
    bus,
    contentGenerator: scripted.generator,
  });
  return { engine, bus, ...scripted };
}

describe('ReasoningEngine.solve', () => {
  it('should succeed on the first attempt when every check passes', async () => {
    const { engine, generateContent } = makeEngine(attemptReplies(PASSING_CHECKS));

    const response = await engine.solve('What is 25 + 37?');

    expect(response.toRecord()).toEqual({
      answer: '62',
      status: 'success',
      reasoning_visible_to_user: '25 plus 37 is 62',
      metadata: { plan: '1. Add\n2. Verify', checks: PASSING_CHECKS, retries: 0 },
    });
    expect(generateContent).toHaveBeenCalledTimes(3);
  });

  it('should call plan, execute and verify in that order with prior outputs', async () => {
    const { engine, generateContent } = makeEngine(attemptReplies(PASSING_CHECKS, 'PLAN-TEXT'));

    await engine.solve('What is 25 + 37?');

    expect(promptOfCall(generateContent, 0)).toContain('Question: What is 25 + 37?\n\nPlan:');
    expect(promptOfCall(generateContent, 1)).toContain('Plan to follow:\nPLAN-TEXT');
    expect(promptOfCall(generateContent, 2)).toContain('Answer: 62\nReasoning: 25 plus 37 is 62');
  });

  it('should stop at the first verified attempt and report earlier failures as retries', async () => {
    const { engine, generateContent } = makeEngine(
      [
        ...attemptReplies(FAILING_CHECKS, 'first plan'),
        ...attemptReplies(PASSING_CHECKS, 'second plan'),
        // never consumed
        ...attemptReplies(PASSING_CHECKS, 'third plan'),
      ],
      { maxRetries: 2 },
    );

    const response = await engine.solve('What is 25 + 37?');

    expect(response.status).toBe('success');
    expect(response.metadata.retries).toBe(1);
    expect(response.metadata.plan).toBe('second plan');
    expect(response.metadata.checks).toEqual(PASSING_CHECKS);
    expect(generateContent).toHaveBeenCalledTimes(6);
  });

  it('should fail after max retries and keep every attempt\'s checks in order', async () => {
    const second: Check[] = [
      { check_name: 'Logic Check', passed: false, details: 'Skipped a step' },
      { check_name: 'Units Check', passed: false, details: 'Mixed hours and minutes' },
    ];
    const { engine, generateContent } = makeEngine(
      [...attemptReplies(FAILING_CHECKS, 'plan A'), ...attemptReplies(second, 'plan B')],
      { maxRetries: 1 },
    );

    const response = await engine.solve('q');

    expect(generateContent).toHaveBeenCalledTimes(6);
    expect(response.toRecord()).toEqual({
      answer: UNVERIFIED_ANSWER,
      status: 'failed',
      reasoning_visible_to_user:
        'Verification failed after 1 retries. Issues: Arithmetic Check: Sum is off by one; Logic Check: Skipped a step; Units Check: Mixed hours and minutes',
      metadata: { plan: 'plan B', checks: [...FAILING_CHECKS, ...second], retries: 1 },
    });
  });

  it('should run exactly one attempt when max retries is zero', async () => {
    const failing: Check[] = [{ check_name: 'Correctness Check', passed: false, details: 'Got 61' }];
    const { engine, generateContent } = makeEngine(attemptReplies(failing), { maxRetries: 0 });

    const response = await engine.solve('q');

    expect(generateContent).toHaveBeenCalledTimes(3);
    expect(response.status).toBe('failed');
    expect(response.metadata.retries).toBe(0);
    expect(response.metadata.checks).toEqual(failing);
    expect(response.reasoning_visible_to_user).toBe(
      'Verification failed after 0 retries. Issues: Correctness Check: Got 61',
    );
  });

  it('should never exceed max retries + 1 attempts', async () => {
    const replies = Array.from({ length: 10 }, () => attemptReplies(FAILING_CHECKS)).flat();
    const { engine, generateContent, bus } = makeEngine(replies, { maxRetries: 3 });

    const response = await engine.solve('q');

    expect(generateContent).toHaveBeenCalledTimes(12);
    expect(bus.history().filter((e) => e.type === 'attempt-start')).toHaveLength(4);
    expect(response.metadata.checks).toHaveLength(8);
  });

  it('should treat an empty check list as a failure', async () => {
    const { engine } = makeEngine(attemptReplies([]), { maxRetries: 0 });

    const response = await engine.solve('q');

    expect(response.status).toBe('failed');
    expect(response.metadata.checks).toEqual([]);
    expect(response.reasoning_visible_to_user).toBe(
      'Verification failed after 0 retries. Issues: no failing checks were reported',
    );
  });

  it('should quote only the last three failing checks across attempts', async () => {
    const attempt = (n: number): Check[] => [
      { check_name: `Check ${n}a`, passed: false, details: 'bad' },
      { check_name: `Check ${n}b`, passed: false, details: 'bad' },
    ];
    const { engine } = makeEngine(
      [...attemptReplies(attempt(1)), ...attemptReplies(attempt(2))],
      { maxRetries: 1 },
    );

    const response = await engine.solve('q');

    expect(response.reasoning_visible_to_user).toBe(
      'Verification failed after 1 retries. Issues: Check 1b: bad; Check 2a: bad; Check 2b: bad',
    );
  });

  it('should fail closed when the verifier reply cannot be parsed', async () => {
    const { engine } = makeEngine(['plan', SOLUTION_JSON, 'The answer 4 is correct.'], { maxRetries: 0 });

    const response = await engine.solve('q');

    expect(response.status).toBe('failed');
    expect(response.metadata.checks[0].check_name).toBe('Verification Error');
  });

  it('should accept an unparseable verifier reply under the lenient policy', async () => {
    const { engine } = makeEngine(['plan', SOLUTION_JSON, 'The answer is correct.'], {
      maxRetries: 0,
      verifyFallback: 'lenient',
    });

    const response = await engine.solve('q');

    expect(response.status).toBe('success');
    expect(response.metadata.checks[0].check_name).toBe('Basic Verification');
  });

  it('should use the inline rate-limit retry text as the plan', async () => {
    const { engine, generateContent } = makeEngine(
      [new Error('429 Too Many Requests'), 'retried plan', SOLUTION_JSON, checksJson(PASSING_CHECKS)],
      { maxRetries: 0 },
    );

    const response = await engine.solve('q');

    expect(response.metadata.plan).toBe('retried plan');
    expect(promptOfCall(generateContent, 2)).toContain('Plan to follow:\nretried plan');
  });

  it('should feed a gateway error marker to the executor as the plan', async () => {
    const { engine, generateContent } = makeEngine(
      [new Error('429'), new Error('429'), SOLUTION_JSON, checksJson(PASSING_CHECKS)],
      { maxRetries: 0 },
    );

    const response = await engine.solve('q');

    expect(response.metadata.plan).toBe(RATE_LIMIT_MARKER);
    expect(promptOfCall(generateContent, 2)).toContain(`Plan to follow:\n${RATE_LIMIT_MARKER}`);
  });

  it('should still verify the error solution when execution output is unreadable', async () => {
    const { engine, generateContent } = makeEngine(
      ['plan', 'no json here', checksJson(FAILING_CHECKS)],
      { maxRetries: 0 },
    );

    await engine.solve('q');

    expect(promptOfCall(generateContent, 2)).toContain('Answer: Error parsing response');
  });

  it('should degrade a faulting stage instead of rejecting', async () => {
    vi.spyOn(LlmGateway.prototype, 'call')
      .mockResolvedValueOnce('plan')
      .mockResolvedValueOnce(SOLUTION_JSON)
      .mockRejectedValueOnce(new Error('transport broke'));
    const { engine, bus } = makeEngine([], { maxRetries: 0 });

    const response = await engine.solve('q');

    expect(response.status).toBe('failed');
    expect(bus.history().some((e) => e.type === 'error')).toBe(true);
    expect(response.metadata.checks).toEqual([{
      check_name: 'Verification Error',
      passed: false,
      details: 'Could not parse verification properly. Raw response: Verification failed: transport broke',
    }]);
  });

  it.each(['agent-start', 'agent-end', 'attempt-start', 'attempt-end', 'progress', 'log'] as const)(
    'should resolve normally when a %s subscriber throws',
    async (type) => {
      const onHandlerError = vi.fn();
      const bus = new AgentEventBus(1000, onHandlerError);
      bus.subscribe(type, () => {
        throw new Error('listener exploded');
      });
      const { generator } = createScriptedGenerator(['plan', 'not json', checksJson(PASSING_CHECKS)]);
      const engine = new ReasoningEngine(createTestConfig({ maxRetries: 0 }), {
        bus,
        contentGenerator: generator,
      });

      const response = await engine.solve('q');

      expect(response.status).toBe('success');
      expect(onHandlerError).toHaveBeenCalledWith(type, expect.any(Error));
    },
  );

  it('should resolve normally when an error subscriber throws', async () => {
    const onHandlerError = vi.fn();
    const bus = new AgentEventBus(1000, onHandlerError);
    bus.subscribe('error', () => {
      throw new Error('listener exploded');
    });
    const { generator } = createScriptedGenerator([
      new Error('fetch failed'),
      SOLUTION_JSON,
      checksJson(PASSING_CHECKS),
    ]);
    const engine = new ReasoningEngine(createTestConfig({ maxRetries: 0 }), {
      bus,
      contentGenerator: generator,
    });

    const response = await engine.solve('q');

    expect(response.status).toBe('success');
    expect(response.metadata.plan).toBe('Error calling LLM: fetch failed');
    expect(onHandlerError).toHaveBeenCalledWith('error', expect.any(Error));
  });

  it('should write phase lines only for an engine in debug mode', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const debug = makeEngine(attemptReplies(PASSING_CHECKS), { debugMode: true });
    const normal = makeEngine(attemptReplies(PASSING_CHECKS));

    await normal.engine.solve('q');
    expect(stderr).not.toHaveBeenCalled();

    await debug.engine.solve('q');
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('[ENGINE] attempt 1 verified'));
  });

  it('should publish attempt events carrying the intermediate outputs', async () => {
    const { engine, bus } = makeEngine(attemptReplies(PASSING_CHECKS, 'the plan'));

    await engine.solve('q');

    const ends = bus.history().filter((e) => e.type === 'attempt-end');
    expect(ends).toHaveLength(1);
    expect(ends[0].payload).toEqual({
      attempt: 0,
      plan: 'the plan',
      solution: { answer: '62', reasoning: '25 plus 37 is 62', intermediate_work: '25 + 37 = 62' },
      checks: PASSING_CHECKS,
      passed: true,
    });
  });

  it('should keep concurrent solves independent', async () => {
    const first = makeEngine(attemptReplies(PASSING_CHECKS, 'plan one'));
    const second = makeEngine(attemptReplies(FAILING_CHECKS, 'plan two'), { maxRetries: 0 });

    const [a, b] = await Promise.all([first.engine.solve('q1'), second.engine.solve('q2')]);

    expect(a.status).toBe('success');
    expect(b.status).toBe('failed');
    expect(b.metadata.checks).toEqual(FAILING_CHECKS);
  });
});

describe('createReasoningEngine', () => {
  it('should raise ConfigError before any call when the key is missing', () => {
    const { generator, generateContent } = createScriptedGenerator([]);
    expect(() => createReasoningEngine({}, { contentGenerator: generator })).toThrow(ConfigError);
    expect(generateContent).not.toHaveBeenCalled();
  });

  it('should build a working engine from parameters', async () => {
    const { generator } = createScriptedGenerator(attemptReplies(PASSING_CHECKS));
    const engine = createReasoningEngine(
      { apiKey: 'test-key', maxRetries: 0 },
      { contentGenerator: generator },
    );

    expect((await engine.solve('q')).status).toBe('success');
  });
});

describe('allChecksPassed', () => {
  it('should require at least one check', () => {
    expect(allChecksPassed([])).toBe(false);
  });

  it('should require every check to pass', () => {
    expect(allChecksPassed(PASSING_CHECKS)).toBe(true);
    expect(allChecksPassed(FAILING_CHECKS)).toBe(false);
  });
});

describe('summarizeFailures', () => {
  it('should skip passing checks', () => {
    expect(summarizeFailures(FAILING_CHECKS)).toBe('Arithmetic Check: Sum is off by one');
  });

  it('should return an empty string when nothing failed', () => {
    expect(summarizeFailures(PASSING_CHECKS)).toBe('');
  });
});
