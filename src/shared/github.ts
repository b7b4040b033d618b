/**
 * GitHub API client wrapper
 * Provides the two REST calls the dispatcher makes: installation token
 * exchange and workflow dispatch
 */

import * as core from '@actions/core';
import { getOctokit } from '@actions/github';
import type { JsonValue } from './json.js';

export type Octokit = ReturnType<typeof getOctokit>;

export const GITHUB_API_VERSION = '2022-11-28';
export const GITHUB_MEDIA_TYPE = 'application/vnd.github+json';

// Sent on every request alongside the credential
export const GITHUB_REQUEST_HEADERS = {
  accept: GITHUB_MEDIA_TYPE,
  'x-github-api-version': GITHUB_API_VERSION
};

// GitHub repository context
export interface RepoContext {
  owner: string;
  repo: string;
}

// Workflow dispatch inputs; values may be any JSON value
export interface WorkflowDispatchInputs {
  [key: string]: JsonValue;
}

export interface WorkflowDispatchResponse {
  status: number;
  data: unknown;
}

// Transport overrides, used by tests and GHES deployments
export interface GitHubClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Create an Octokit instance for a bearer credential (App JWT or installation token)
 */
export function createOctokit(token: string, options: GitHubClientOptions = {}): Octokit {
  const octokitOptions: NonNullable<Parameters<typeof getOctokit>[1]> = {};
  if (options.baseUrl) {
    octokitOptions.baseUrl = options.baseUrl;
  }
  if (options.fetch) {
    octokitOptions.request = { fetch: options.fetch };
  }
  return getOctokit(token, octokitOptions);
}

/**
 * GitHub App client, authenticated with a signed App JWT
 */
export class GitHubAppClient {
  private octokit: Octokit;

  /**
   * @param appJwt - Signed App JWT
   * @param options - Transport overrides
   */
  constructor(appJwt: string, options: GitHubClientOptions = {}) {
    this.octokit = createOctokit(appJwt, options);
  }

  /**
   * Exchange the App JWT for an installation access token
   * @param installationId - Installation to scope the token to
   * @returns The raw JSON body of the token response
   */
  async createInstallationAccessToken(installationId: number): Promise<unknown> {
    core.debug(`POST /app/installations/${installationId}/access_tokens`);
    const response = await this.octokit.request(
      'POST /app/installations/{installation_id}/access_tokens',
      {
        installation_id: installationId,
        headers: GITHUB_REQUEST_HEADERS
      }
    );
    return response.data;
  }
}

/**
 * Repository client, authenticated with an installation access token
 */
export class GitHubClient {
  private octokit: Octokit;
  private owner: string;
  private repo: string;

  /**
   * @param token - Installation access token
   * @param context - Repository context
   * @param options - Transport overrides
   */
  constructor(token: string, context: RepoContext, options: GitHubClientOptions = {}) {
    this.octokit = createOctokit(token, options);
    this.owner = context.owner;
    this.repo = context.repo;
  }

  /**
   * Dispatch a workflow run. Single attempt, no retry.
   * @param workflowFile - Workflow filename or ID
   * @param ref - Git ref to run against
   * @param inputs - Workflow inputs; omitted from the body when absent or empty
   * @returns Status and body of the 2xx response; non-2xx responses throw RequestError
   */
  async dispatchWorkflow(
    workflowFile: string,
    ref: string,
    inputs?: WorkflowDispatchInputs | null
  ): Promise<WorkflowDispatchResponse> {
    const body: { ref: string; inputs?: WorkflowDispatchInputs } = { ref };
    if (inputs && Object.keys(inputs).length > 0) {
      body.inputs = inputs;
    }

    core.debug(
      `POST /repos/${this.owner}/${this.repo}/actions/workflows/${workflowFile}/dispatches`
    );
    const response = await this.octokit.request(
      'POST /repos/{owner}/{repo}/actions/workflows/{workflow_id}/dispatches',
      {
        owner: this.owner,
        repo: this.repo,
        workflow_id: workflowFile,
        ...body,
        headers: GITHUB_REQUEST_HEADERS
      }
    );
    return { status: response.status, data: response.data };
  }
}
