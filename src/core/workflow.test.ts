import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';

import { defineWorkflow, WorkflowStepError } from './workflow.js';
import { StateValidationError } from './state.js';

interface Counter {
  value: number;
  trail: string[];
}

describe('defineWorkflow', () => {
  it('exposes step ids in execution order', () => {
    const wf = defineWorkflow<Counter>({
      id: 'counter',
      steps: [
        { id: 'first', run: async (s) => s },
        { id: 'second', run: async (s) => s },
      ],
    });

    assert.strictEqual(wf.id, 'counter');
    assert.deepStrictEqual(wf.stepIds, ['first', 'second']);
  });

  it('rejects an empty step list', () => {
    assert.throws(() => defineWorkflow<Counter>({ id: 'empty', steps: [] }), /has no steps/);
  });

  it('rejects duplicate step ids', () => {
    assert.throws(
      () =>
        defineWorkflow<Counter>({
          id: 'dup',
          steps: [
            { id: 'a', run: async (s) => s },
            { id: 'a', run: async (s) => s },
          ],
        }),
      /duplicate step id "a"/
    );
  });
});

describe('workflow.run', () => {
  it('threads state through steps in order', async () => {
    const wf = defineWorkflow<Counter>({
      id: 'counter',
      steps: [
        { id: 'add', run: async (s) => ({ value: s.value + 2, trail: [...s.trail, 'add'] }) },
        { id: 'double', run: async (s) => ({ value: s.value * 2, trail: [...s.trail, 'double'] }) },
      ],
    });

    const result = await wf.run({ value: 1, trail: [] });

    assert.deepStrictEqual(result, { value: 6, trail: ['add', 'double'] });
  });

  it('validates the initial state against the schema', async () => {
    const wf = defineWorkflow<Counter>({
      id: 'validated',
      stateSchema: z.object({ value: z.number().nonnegative(), trail: z.array(z.string()) }),
      steps: [{ id: 'noop', run: async (s) => s }],
    });

    await assert.rejects(wf.run({ value: -1, trail: [] }), StateValidationError);
  });

  it('wraps step failures and stops the pipeline', async () => {
    let reachedLast = false;
    const cause = new Error('model unavailable');
    const wf = defineWorkflow<Counter>({
      id: 'failing',
      steps: [
        {
          id: 'classify',
          run: async () => {
            throw cause;
          },
        },
        {
          id: 'last',
          run: async (s) => {
            reachedLast = true;
            return s;
          },
        },
      ],
    });

    await assert.rejects(wf.run({ value: 0, trail: [] }), (err: unknown) => {
      assert.ok(err instanceof WorkflowStepError);
      assert.strictEqual(err.stepId, 'classify');
      assert.strictEqual(err.cause, cause);
      assert.strictEqual(
        err.message,
        'Workflow "failing" failed at step "classify": model unavailable'
      );
      return true;
    });
    assert.strictEqual(reachedLast, false);
  });
});
