/**
 * Workflow dispatcher
 * Fetches the App key, mints an installation token and triggers a
 * workflow_dispatch run. Every path ends in a DispatchResult; nothing throws
 * past this class.
 */

import * as core from '@actions/core';
import { mintInstallationToken } from '../shared/app-auth.js';
import { parseDispatchEvent, type DispatchEvent } from '../shared/config.js';
import {
  GitHubClient,
  type GitHubClientOptions,
  type WorkflowDispatchInputs
} from '../shared/github.js';
import {
  AwsSecretStore,
  DEFAULT_REGION,
  fetchPrivateKey,
  type SecretStore
} from '../shared/secrets.js';
import {
  classifyFailure,
  rejectionFromResponse,
  toDispatchResult,
  type DispatchOutcome,
  type DispatchResult,
  type DispatchStage
} from './outcome.js';

export type { DispatchOutcome, DispatchResult } from './outcome.js';

// Parameters of a single dispatch
export interface TriggerWorkflowParams {
  appId: string;
  installationId: string;
  secretName: string;
  repoOwner: string;
  repoName: string;
  workflowFile: string;
  ref: string;
  workflowInputs?: WorkflowDispatchInputs | null;
  regionName?: string;
}

// External services, replaceable for tests
export interface DispatcherDependencies {
  createSecretStore?: (region: string) => SecretStore;
  github?: GitHubClientOptions;
  now?: () => number;
}

/**
 * Convert a validated invocation event into dispatch parameters
 */
export function paramsFromEvent(event: DispatchEvent): TriggerWorkflowParams {
  return {
    appId: event.app_id,
    installationId: event.installation_id,
    secretName: event.secret_name,
    repoOwner: event.repo_owner,
    repoName: event.repo_name,
    workflowFile: event.workflow_file,
    ref: event.ref,
    workflowInputs: event.workflow_inputs,
    regionName: event.region_name
  };
}

function logOutcome(outcome: DispatchOutcome): void {
  switch (outcome.kind) {
    case 'dispatched':
      core.info(`Workflow '${outcome.workflowFile}' dispatched on ref '${outcome.ref}'`);
      break;
    case 'dispatch-rejected':
      core.warning(`Workflow dispatch rejected with status ${outcome.status}: ${outcome.message}`);
      break;
    case 'token-exchange-failed':
      core.warning(`Installation token exchange failed with status ${outcome.status}: ${outcome.message}`);
      break;
    case 'secret-unavailable':
      core.error(`Secret '${outcome.secretName}' unavailable: ${outcome.message}`);
      break;
    case 'unexpected-failure':
      core.error(`Unexpected error during workflow dispatch: ${outcome.message}`);
      break;
    case 'invalid-event':
      core.warning(`Invalid dispatch event: ${outcome.issues.join('; ')}`);
      break;
  }
}

/**
 * Dispatcher class
 */
export class WorkflowDispatcher {
  private createSecretStore: (region: string) => SecretStore;
  private github: GitHubClientOptions;
  private now: () => number;

  constructor(dependencies: DispatcherDependencies = {}) {
    this.createSecretStore = dependencies.createSecretStore ?? (region => new AwsSecretStore(region));
    this.github = dependencies.github ?? {};
    this.now = dependencies.now ?? Date.now;
  }

  /**
   * Run the secret → token → dispatch chain and classify how it ended
   */
  async dispatch(params: TriggerWorkflowParams): Promise<DispatchOutcome> {
    const { repoOwner, repoName, workflowFile, ref } = params;
    let stage: DispatchStage = 'secret';

    try {
      core.info(`Dispatching workflow '${workflowFile}' in ${repoOwner}/${repoName} on ref '${ref}'`);

      const store = this.createSecretStore(params.regionName ?? DEFAULT_REGION);
      const privateKeyPem = await fetchPrivateKey(store, params.secretName);

      stage = 'token';
      const token = await mintInstallationToken(
        { appId: params.appId, installationId: params.installationId, privateKeyPem },
        { ...this.github, now: this.now }
      );

      stage = 'dispatch';
      const client = new GitHubClient(token, { owner: repoOwner, repo: repoName }, this.github);
      const response = await client.dispatchWorkflow(workflowFile, ref, params.workflowInputs);

      // 204 No Content is the only success answer for workflow dispatch
      if (response.status === 204) {
        return { kind: 'dispatched', workflowFile, ref };
      }
      return rejectionFromResponse(response.status, response.data);
    } catch (error) {
      core.debug(`Dispatch failed during '${stage}' step`);
      return classifyFailure(stage, error);
    }
  }

  /**
   * Trigger a workflow and return the result record
   */
  async triggerWorkflow(params: TriggerWorkflowParams): Promise<DispatchResult> {
    const outcome = await this.dispatch(params);
    logOutcome(outcome);
    return toDispatchResult(outcome);
  }

  /**
   * Validate an untrusted invocation event, then trigger the workflow
   */
  async triggerFromEvent(raw: unknown): Promise<DispatchResult> {
    const parsed = parseDispatchEvent(raw);
    if (!parsed.success) {
      const outcome: DispatchOutcome = { kind: 'invalid-event', issues: parsed.issues };
      logOutcome(outcome);
      return toDispatchResult(outcome);
    }
    return this.triggerWorkflow(paramsFromEvent(parsed.event));
  }
}

/**
 * Trigger a workflow with default dependencies (AWS Secrets Manager, api.github.com)
 */
export async function triggerWorkflow(
  params: TriggerWorkflowParams,
  dependencies: DispatcherDependencies = {}
): Promise<DispatchResult> {
  return new WorkflowDispatcher(dependencies).triggerWorkflow(params);
}
