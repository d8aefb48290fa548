/**
 * Workflow definition and creation.
 *
 * A workflow is a fixed, linear sequence of named steps. Each step takes the
 * current state and returns the next one; there is no branching and no retry.
 */

import type { ZodType } from 'zod';
import { validateState } from './state.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const logger = createLogger({ name: 'workflow' });

/**
 * One stage of a workflow.
 */
export interface WorkflowStep<TState> {
  /** Step identifier, unique within the workflow */
  id: string;
  run: (state: TState) => Promise<TState>;
}

/**
 * Configuration for defining a workflow.
 */
export interface WorkflowConfig<TState> {
  /** Unique workflow identifier */
  id: string;
  description?: string | undefined;
  /** Zod schema the initial state must satisfy */
  stateSchema?: ZodType<TState> | undefined;
  /** Steps, in execution order */
  steps: WorkflowStep<TState>[];
}

export interface Workflow<TState> {
  readonly id: string;
  readonly config: WorkflowConfig<TState>;
  /** Step ids in execution order */
  readonly stepIds: string[];
  /** Run every step in order and return the terminal state */
  run(initialState: TState): Promise<TState>;
}

/**
 * Error thrown when a step fails. The step's own error is kept as `cause`.
 */
export class WorkflowStepError extends Error {
  constructor(
    public readonly workflowId: string,
    public readonly stepId: string,
    cause: unknown
  ) {
    super(`Workflow "${workflowId}" failed at step "${stepId}": ${errorMessage(cause)}`, {
      cause,
    });
    this.name = 'WorkflowStepError';
  }
}

/**
 * Define a workflow.
 *
 * @example
 * ```typescript
 * const pipeline = defineWorkflow<ConversationState>({
 *   id: 'travel_assistant',
 *   stateSchema: conversationStateSchema,
 *   steps: [
 *     { id: 'classify_intent', run: classifyStep },
 *     { id: 'smart_agent', run: respondStep },
 *     { id: 'update_memory', run: memoryStep },
 *   ],
 * });
 *
 * const finalState = await pipeline.run(createInitialState('Hi there'));
 * ```
 */
export function defineWorkflow<TState>(config: WorkflowConfig<TState>): Workflow<TState> {
  if (config.steps.length === 0) {
    throw new Error(`Workflow "${config.id}" has no steps`);
  }

  const stepIds = config.steps.map((step) => step.id);
  const duplicate = stepIds.find((id, index) => stepIds.indexOf(id) !== index);
  if (duplicate !== undefined) {
    throw new Error(`Workflow "${config.id}" has duplicate step id "${duplicate}"`);
  }

  return {
    id: config.id,
    config,
    stepIds,
    async run(initialState: TState): Promise<TState> {
      let state = config.stateSchema
        ? validateState(initialState, config.stateSchema)
        : initialState;

      for (const step of config.steps) {
        const startedAt = Date.now();
        try {
          state = await step.run(state);
        } catch (err) {
          logger.error('Step failed', {
            workflow: config.id,
            step: step.id,
            error: errorMessage(err),
          });
          throw new WorkflowStepError(config.id, step.id, err);
        }
        logger.debug('Step completed', {
          workflow: config.id,
          step: step.id,
          durationMs: Date.now() - startedAt,
        });
      }

      return state;
    },
  };
}
