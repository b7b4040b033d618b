/**
 * GitHub Action / CLI runner
 * Reads dispatch parameters from action inputs or environment variables and
 * reports the result as step outputs
 */

import * as core from '@actions/core';
import { readEventFromInputs } from '../shared/config.js';
import { WorkflowDispatcher, type DispatcherDependencies, type DispatchResult } from './index.js';

export async function runAction(
  dependencies: DispatcherDependencies = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<DispatchResult> {
  let event: Record<string, unknown>;
  try {
    event = readEventFromInputs(env);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
    return { success: false, status_code: 400, message: `Invalid event: ${message}` };
  }

  const dispatcher = new WorkflowDispatcher(dependencies);
  const result = await dispatcher.triggerFromEvent(event);

  core.setOutput('success', result.success);
  core.setOutput('status_code', result.status_code);
  core.setOutput('message', result.message);

  if (!result.success) {
    core.setFailed(`Workflow dispatch failed (${result.status_code}): ${result.message}`);
  }
  return result;
}
