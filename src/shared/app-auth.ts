/**
 * GitHub App authentication
 * Signs the App JWT and exchanges it for an installation access token
 */

import { createPrivateKey } from 'node:crypto';
import * as core from '@actions/core';
import { SignJWT } from 'jose';
import { GitHubAppClient, type GitHubClientOptions } from './github.js';
import { isJsonObject } from './json.js';

// Backdated to tolerate clock drift between us and GitHub
export const JWT_CLOCK_DRIFT_SECONDS = 60;
// GitHub rejects App JWTs valid for more than 10 minutes
export const JWT_TTL_SECONDS = 10 * 60;

export interface AppCredential {
  appId: string;
  installationId: string;
  privateKeyPem: string;
}

export interface MintOptions extends GitHubClientOptions {
  now?: () => number;
}

/**
 * Create a signed App JWT
 * @param appId - GitHub App ID, used as the issuer
 * @param privateKeyPem - PKCS#1 or PKCS#8 PEM private key
 * @param now - Current time in milliseconds
 */
export async function createAppJwt(
  appId: string,
  privateKeyPem: string,
  now: number = Date.now()
): Promise<string> {
  const nowSeconds = Math.floor(now / 1000);
  const key = createPrivateKey(privateKeyPem);

  return new SignJWT({
    iat: nowSeconds - JWT_CLOCK_DRIFT_SECONDS,
    exp: nowSeconds + JWT_TTL_SECONDS,
    iss: appId
  })
    .setProtectedHeader({ alg: 'RS256' })
    .sign(key);
}

/**
 * Mint an installation access token for a GitHub App installation.
 * HTTP failures from the token endpoint propagate as RequestError.
 */
export async function mintInstallationToken(
  credential: AppCredential,
  options: MintOptions = {}
): Promise<string> {
  const { now = Date.now, ...clientOptions } = options;
  if (!/^\d+$/.test(credential.installationId)) {
    throw new Error(`Invalid installation id: '${credential.installationId}'`);
  }
  const appJwt = await createAppJwt(credential.appId, credential.privateKeyPem, now());

  const client = new GitHubAppClient(appJwt, clientOptions);
  const body = await client.createInstallationAccessToken(Number(credential.installationId));

  const token = isJsonObject(body) ? body.token : undefined;
  if (typeof token !== 'string' || token.length === 0) {
    throw new Error('Malformed installation token response: missing "token" field');
  }

  core.debug(`Obtained installation token for installation ${credential.installationId}`);
  return token;
}
