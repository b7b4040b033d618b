/**
 * Dispatch outcomes
 * One variant per terminal state of a dispatch, and its mapping to the
 * result record returned to callers
 */

import { isJsonObject, parseJsonSafe } from '../shared/json.js';
import { SecretStoreError } from '../shared/secrets.js';

// Result record returned to the invoker
export interface DispatchResult {
  success: boolean;
  status_code: number;
  message: string;
  errors?: unknown[];
}

export type DispatchOutcome =
  | { kind: 'dispatched'; workflowFile: string; ref: string }
  | { kind: 'dispatch-rejected'; status: number; message: string; errors: unknown[] }
  | { kind: 'token-exchange-failed'; status: number; message: string }
  | { kind: 'secret-unavailable'; secretName: string; message: string }
  | { kind: 'unexpected-failure'; message: string }
  | { kind: 'invalid-event'; issues: string[] };

// Step of the call chain an error was raised from
export type DispatchStage = 'secret' | 'token' | 'dispatch';

// HTTP error raised by Octokit (RequestError) for a response with an error status
interface HttpError extends Error {
  status: number;
  response: { data: unknown };
}

function isHttpError(error: unknown): error is HttpError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'response' in error &&
    isJsonObject(error.response)
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build a rejection from the body of a non-204 dispatch response.
 * An empty body counts as {}; a body without a message falls back to the raw text.
 */
export function rejectionFromResponse(status: number, data: unknown): DispatchOutcome {
  let rawText: string;
  let detail: unknown;

  if (data === undefined || data === null) {
    rawText = '';
    detail = {};
  } else if (typeof data === 'string') {
    rawText = data;
    detail = data.length > 0 ? parseJsonSafe(data) : {};
  } else {
    rawText = JSON.stringify(data);
    detail = data;
  }

  const message = isJsonObject(detail) && typeof detail.message === 'string'
    ? detail.message
    : rawText;
  const errors = isJsonObject(detail) && Array.isArray(detail.errors) ? detail.errors : [];

  return { kind: 'dispatch-rejected', status, message, errors };
}

/**
 * Classify an error raised while dispatching.
 * Request errors without a response (DNS, connection reset) are network
 * failures and count as unexpected.
 */
export function classifyFailure(stage: DispatchStage, error: unknown): DispatchOutcome {
  if (error instanceof SecretStoreError) {
    return { kind: 'secret-unavailable', secretName: error.secretName, message: error.message };
  }

  if (isHttpError(error)) {
    if (stage === 'token') {
      return {
        kind: 'token-exchange-failed',
        status: error.status || 500,
        message: error.message
      };
    }
    if (stage === 'dispatch') {
      return rejectionFromResponse(error.status, error.response.data);
    }
  }

  return { kind: 'unexpected-failure', message: errorMessage(error) };
}

/**
 * Map an outcome to the result record returned to the invoker
 */
export function toDispatchResult(outcome: DispatchOutcome): DispatchResult {
  switch (outcome.kind) {
    case 'dispatched':
      return {
        success: true,
        status_code: 204,
        message: `Workflow '${outcome.workflowFile}' triggered successfully on ref '${outcome.ref}'`
      };
    case 'dispatch-rejected':
      return {
        success: false,
        status_code: outcome.status,
        message: outcome.message,
        errors: outcome.errors
      };
    case 'token-exchange-failed':
      return { success: false, status_code: outcome.status, message: outcome.message };
    case 'secret-unavailable':
    case 'unexpected-failure':
      return { success: false, status_code: 500, message: `Unexpected error: ${outcome.message}` };
    case 'invalid-event':
      return {
        success: false,
        status_code: 400,
        message: `Invalid event: ${outcome.issues.join('; ')}`
      };
    default: {
      const exhaustivenessCheck: never = outcome;
      throw new Error(`Unhandled dispatch outcome: ${JSON.stringify(exhaustivenessCheck)}`);
    }
  }
}
