/**
 * Plan synthesizer tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PlanSynthesizer } from '../../src/services/test-strategist/plan-synthesizer.js';
import { PLAN_SYSTEM_PROMPT } from '../../src/services/test-strategist/prompts.js';
import { PlanError, PlanErrorType } from '../../src/services/test-strategist/types.js';
import { ServiceError, ServiceErrorType } from '../../src/llm/text-service.js';
import { ScriptedTextService, available, unavailable } from '../fixtures/text-service.fixture.js';

const LOGIN_PLAN = {
  fields: ['email', 'password'],
  scenarios: [
    { scenario_name: 'Valid login', test_type: 'positive', description: 'Correct credentials' },
    { scenario_name: 'Wrong password', test_type: 'negative', description: 'Password does not match' },
  ],
};

function isPlanError(type: PlanErrorType) {
  return (error: unknown): boolean => error instanceof PlanError && error.type === type;
}

describe('PlanSynthesizer', () => {
  it('should turn a fenced JSON reply into a plan', async () => {
    const service = new ScriptedTextService('```json\n' + JSON.stringify(LOGIN_PLAN) + '\n```');
    const synthesizer = new PlanSynthesizer(available(service));

    const plan = await synthesizer.synthesize('  a login form with email and password ');

    assert.deepStrictEqual(plan, {
      fields: ['email', 'password'],
      scenarios: [
        { name: 'Valid login', testType: 'positive', description: 'Correct credentials' },
        { name: 'Wrong password', testType: 'negative', description: 'Password does not match' },
      ],
    });

    const call = service.calls[0];
    assert.ok(call);
    assert.ok(call.prompt.includes('"a login form with email and password"'));
    assert.strictEqual(call.options?.systemPrompt, PLAN_SYSTEM_PROMPT);
  });

  it('should drop duplicate fields and default a missing description', async () => {
    const service = new ScriptedTextService(
      JSON.stringify({
        fields: ['email', 'email', 'age'],
        scenarios: [{ scenario_name: 'Adult', test_type: 'edge' }],
      })
    );

    const plan = await new PlanSynthesizer(available(service)).synthesize('signup');

    assert.deepStrictEqual(plan.fields, ['email', 'age']);
    assert.deepStrictEqual(plan.scenarios, [{ name: 'Adult', testType: 'edge', description: '' }]);
  });

  it('should reject blank and oversized requirements without calling the service', async () => {
    const service = new ScriptedTextService(JSON.stringify(LOGIN_PLAN));
    const synthesizer = new PlanSynthesizer(available(service));

    await assert.rejects(synthesizer.synthesize('   '), isPlanError(PlanErrorType.INVALID_INPUT));
    await assert.rejects(synthesizer.synthesize('x'.repeat(5001)), isPlanError(PlanErrorType.INVALID_INPUT));
    assert.strictEqual(service.calls.length, 0);
  });

  it('should fail with SERVICE_ERROR when the service fails or is missing', async () => {
    const failing = new ScriptedTextService(new ServiceError(ServiceErrorType.PROVIDER, 'quota exceeded'));

    await assert.rejects(
      new PlanSynthesizer(available(failing)).synthesize('login'),
      (error: unknown) =>
        error instanceof PlanError &&
        error.type === PlanErrorType.SERVICE_ERROR &&
        error.message === '[PlanSynthesizer] SERVICE_ERROR: [TextService] PROVIDER: quota exceeded'
    );
    await assert.rejects(new PlanSynthesizer(unavailable).synthesize('login'), isPlanError(PlanErrorType.SERVICE_ERROR));
  });

  it('should fail with PARSE_ERROR on malformed replies', async () => {
    const cases = [
      'I cannot help with that.',
      JSON.stringify({ fields: ['a'] }),
      JSON.stringify({ fields: ['a'], scenarios: [{ scenario_name: 'x' }] }),
    ];

    for (const reply of cases) {
      const synthesizer = new PlanSynthesizer(available(new ScriptedTextService(reply)));
      await assert.rejects(synthesizer.synthesize('login'), isPlanError(PlanErrorType.PARSE_ERROR));
    }
  });

  it('should fail with EMPTY_PLAN when there are no scenarios or fields', async () => {
    const noScenarios = new ScriptedTextService(JSON.stringify({ fields: ['a'], scenarios: [] }));
    const noFields = new ScriptedTextService(JSON.stringify({ fields: [], scenarios: LOGIN_PLAN.scenarios }));

    await assert.rejects(
      new PlanSynthesizer(available(noScenarios)).synthesize('login'),
      isPlanError(PlanErrorType.EMPTY_PLAN)
    );
    await assert.rejects(
      new PlanSynthesizer(available(noFields)).synthesize('login'),
      isPlanError(PlanErrorType.EMPTY_PLAN)
    );
  });
});
