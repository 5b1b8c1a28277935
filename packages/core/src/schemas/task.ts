/**
 * Task validation schemas using Zod
 *
 * Task input arrives from an external caller (the HTTP layer, the CLI) and is
 * validated here before it reaches the pool.
 */

import { z } from 'zod';
import { Errors } from '../errors.js';
import { ID_PREFIX, MAX_RETRIES } from '../constants.js';
import { generatePrefixedId } from '../utils/id.js';
import { httpUrl, nonEmptyString, toValidationErrors, formatValidationErrors } from '../utils/schema.js';
import type { Action, ExtractionSpec, Task, TaskDefaults, TaskInput } from '../types/task.js';

/** Ten minutes; no single browser task should need more */
const MAX_TASK_TIMEOUT_MS = 600_000;

const durationMs = z.number().int().nonnegative().max(MAX_TASK_TIMEOUT_MS);

/**
 * Action schema
 */
export const ActionSchema: z.ZodType<Action> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('navigate'),
    url: httpUrl.optional(),
    waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']).optional(),
  }),
  z.object({
    type: z.literal('waitForSelector'),
    selector: nonEmptyString,
    timeoutMs: durationMs.optional(),
  }),
  z.object({
    type: z.literal('click'),
    selector: nonEmptyString,
  }),
  z.object({
    type: z.literal('fill'),
    selector: nonEmptyString,
    value: z.string(),
  }),
  z.object({
    type: z.literal('type'),
    selector: nonEmptyString,
    text: z.string(),
    delayMs: z.number().int().nonnegative().max(1000).optional(),
  }),
  z.object({
    type: z.literal('press'),
    selector: nonEmptyString,
    key: nonEmptyString,
  }),
  z.object({
    type: z.literal('wait'),
    durationMs,
  }),
]);

/**
 * Field extraction schema
 */
export const FieldExtractionSchema = z.object({
  selectors: z.array(nonEmptyString).min(1, 'At least one selector is required'),
  attribute: nonEmptyString.optional(),
  multiple: z.boolean().optional(),
  minLength: z.number().int().nonnegative().optional(),
  unique: z.boolean().optional(),
  limit: z.number().int().positive().optional(),
  fallback: z
    .object({
      selector: nonEmptyString,
      contains: nonEmptyString,
      maxLength: z.number().int().positive().optional(),
      limit: z.number().int().positive().optional(),
    })
    .optional(),
});

/**
 * Extraction specification schema
 */
export const ExtractionSpecSchema: z.ZodType<ExtractionSpec> = z.record(
  nonEmptyString,
  FieldExtractionSchema
);

/**
 * Task input schema
 */
export const TaskInputSchema: z.ZodType<TaskInput> = z.object({
  id: nonEmptyString.max(100).optional(),
  target: httpUrl,
  actions: z.array(ActionSchema).max(100).optional(),
  extract: ExtractionSpecSchema.optional(),
  timeoutMs: z.number().int().positive().max(MAX_TASK_TIMEOUT_MS).optional(),
  maxRetries: z.number().int().nonnegative().max(MAX_RETRIES.TASK_LIMIT).optional(),
});

function freezeAction(action: Action): Action {
  return Object.freeze({ ...action });
}

function freezeExtraction(spec: ExtractionSpec): Readonly<ExtractionSpec> {
  const frozen: ExtractionSpec = {};
  for (const [name, field] of Object.entries(spec)) {
    frozen[name] = Object.freeze({
      ...field,
      selectors: Object.freeze([...field.selectors]),
      fallback: field.fallback ? Object.freeze({ ...field.fallback }) : undefined,
    });
  }
  return Object.freeze(frozen);
}

/**
 * Validate task input and apply defaults
 *
 * When no actions are given the task navigates to its target. The returned
 * task is frozen.
 *
 * @throws DroverError INVALID_TASK when the input does not match the schema
 */
export function createTask(input: unknown, defaults: TaskDefaults): Task {
  const parsed = TaskInputSchema.safeParse(input);
  if (!parsed.success) {
    const errors = toValidationErrors(parsed.error);
    throw Errors.invalidTask(`Invalid task: ${formatValidationErrors(errors)}`, { errors });
  }

  const data = parsed.data;
  const actions: Action[] = data.actions ?? [{ type: 'navigate' }];

  return Object.freeze({
    id: data.id ?? generatePrefixedId(ID_PREFIX.TASK),
    target: data.target,
    actions: Object.freeze(actions.map(freezeAction)),
    extract: freezeExtraction(data.extract ?? {}),
    timeoutMs: data.timeoutMs ?? defaults.timeoutMs,
    maxRetries: data.maxRetries ?? defaults.maxRetries,
  });
}
