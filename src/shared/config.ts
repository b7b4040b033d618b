/**
 * Dispatch parameters
 * Validates invocation events and reads action/CLI inputs
 */

import * as core from '@actions/core';
import { z } from 'zod';
import type { JsonValue } from './json.js';
import { isJsonObject, safeJsonParse } from './json.js';
import { DEFAULT_REGION } from './secrets.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

const requiredString = () => z.string().min(1, 'must not be empty');

// Numeric ids may arrive as JSON numbers; they are carried as strings
const stringifyNumber = (value: unknown) => (typeof value === 'number' ? String(value) : value);

export const dispatchEventSchema = z.object({
  app_id: z.preprocess(stringifyNumber, requiredString()),
  installation_id: z.preprocess(
    stringifyNumber,
    requiredString().regex(/^\d+$/, 'must be a numeric installation id')
  ),
  secret_name: requiredString(),
  repo_owner: requiredString(),
  repo_name: requiredString(),
  workflow_file: requiredString(),
  ref: requiredString(),
  workflow_inputs: z.record(jsonValueSchema).nullish(),
  region_name: z
    .string()
    .min(1)
    .nullish()
    .transform(value => value ?? DEFAULT_REGION)
});

export type DispatchEvent = z.output<typeof dispatchEventSchema>;

export type ParseEventResult =
  | { success: true; event: DispatchEvent }
  | { success: false; issues: string[] };

/**
 * Validate an invocation event
 * @param raw - Untrusted event payload
 */
export function parseDispatchEvent(raw: unknown): ParseEventResult {
  const result = dispatchEventSchema.safeParse(raw);
  if (result.success) {
    return { success: true, event: result.data };
  }

  const issues = result.error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return { success: false, issues };
}

// Action input names, mirrored as upper-case environment variables
const INPUT_NAMES = [
  'app_id',
  'installation_id',
  'secret_name',
  'repo_owner',
  'repo_name',
  'workflow_file',
  'ref',
  'workflow_inputs',
  'region_name'
] as const;

type InputName = (typeof INPUT_NAMES)[number];

function readInput(name: InputName, env: NodeJS.ProcessEnv): string | undefined {
  const value = core.getInput(name) || env[name.toUpperCase()];
  return value ? value.trim() : undefined;
}

/**
 * Build a raw dispatch event from action inputs, falling back to environment
 * variables (APP_ID, INSTALLATION_ID, ...) when run outside GitHub Actions
 * @param env - Environment to read fallbacks from
 * @returns Untrusted event, to be passed through parseDispatchEvent
 */
export function readEventFromInputs(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const event: Record<string, unknown> = {};
  for (const name of INPUT_NAMES) {
    const value = readInput(name, env);
    if (value === undefined) {
      continue;
    }
    if (name === 'workflow_inputs') {
      const parsed = safeJsonParse(value, 'workflow_inputs');
      if (!isJsonObject(parsed)) {
        throw new Error('workflow_inputs must be a JSON object');
      }
      event[name] = parsed;
    } else {
      event[name] = value;
    }
  }
  return event;
}
