/**
 * Secret retrieval for the GitHub App private key
 */

import * as core from '@actions/core';
import {
  GetSecretValueCommand,
  SecretsManagerClient,
  type GetSecretValueCommandOutput
} from '@aws-sdk/client-secrets-manager';
import { isJsonObject, parseJsonSafe } from './json.js';

// Field holding the PEM when the secret is stored as a JSON object
export const PRIVATE_KEY_FIELD = 'private_key';

export const DEFAULT_REGION = 'us-east-1';

export type SecretPayload =
  | { kind: 'string'; value: string }
  | { kind: 'binary'; value: Uint8Array };

export interface SecretStore {
  getSecretValue(secretName: string): Promise<SecretPayload>;
}

export class SecretStoreError extends Error {
  readonly secretName: string;

  constructor(secretName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SecretStoreError';
    this.secretName = secretName;
  }
}

/**
 * Secret store backed by AWS Secrets Manager
 */
export class AwsSecretStore implements SecretStore {
  private client: SecretsManagerClient;

  /**
   * @param region - AWS region holding the secret
   * @param client - Preconfigured client; built for the region when omitted
   */
  constructor(region: string = DEFAULT_REGION, client?: SecretsManagerClient) {
    this.client = client ?? new SecretsManagerClient({ region });
  }

  async getSecretValue(secretName: string): Promise<SecretPayload> {
    let response: GetSecretValueCommandOutput;
    try {
      response = await this.client.send(new GetSecretValueCommand({ SecretId: secretName }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SecretStoreError(
        secretName,
        `Failed to retrieve secret '${secretName}': ${reason}`,
        { cause: error }
      );
    }

    if (response.SecretString !== undefined) {
      return { kind: 'string', value: response.SecretString };
    }
    if (response.SecretBinary !== undefined) {
      return { kind: 'binary', value: response.SecretBinary };
    }

    throw new SecretStoreError(
      secretName,
      `Secret '${secretName}' has neither a string nor a binary value`
    );
  }
}

/**
 * Turn a secret payload into PEM text.
 * A JSON string with a private_key field is unwrapped; any other string is
 * used as-is, without checking that it is PEM-shaped.
 */
export function extractPrivateKey(payload: SecretPayload): string {
  if (payload.kind === 'binary') {
    return new TextDecoder('utf-8').decode(payload.value);
  }

  const parsed = parseJsonSafe(payload.value);
  if (isJsonObject(parsed)) {
    const field = parsed[PRIVATE_KEY_FIELD];
    if (typeof field === 'string') {
      return field;
    }
  }
  return payload.value;
}

/**
 * Fetch the App private key from a secret store
 * @param store - Secret store to read from
 * @param secretName - Name or ARN of the secret
 * @returns PEM-encoded private key
 */
export async function fetchPrivateKey(store: SecretStore, secretName: string): Promise<string> {
  core.debug(`Fetching private key from secret '${secretName}'`);
  const payload = await store.getSecretValue(secretName);
  return extractPrivateKey(payload);
}
