/**
 * AWS Lambda entry point
 */

import type { Handler } from 'aws-lambda';
import {
  WorkflowDispatcher,
  type DispatcherDependencies,
  type DispatchResult
} from './index.js';

export type DispatchHandler = Handler<unknown, DispatchResult>;

/**
 * Build a Lambda handler. A fresh dispatcher is created per invocation so no
 * clients or tokens carry over between warm starts.
 */
export function createHandler(
  dependencies: DispatcherDependencies = {}
): (event: unknown) => Promise<DispatchResult> {
  return async (event: unknown) => {
    const dispatcher = new WorkflowDispatcher(dependencies);
    return dispatcher.triggerFromEvent(event);
  };
}

export const handler: DispatchHandler = createHandler();
