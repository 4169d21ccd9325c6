/**
 * GitHub App authentication
 *
 * Signs a short-lived app JWT with the private key and exchanges it for an
 * installation access token. Tokens are minted per event and never cached.
 */

import { getOctokit } from '@actions/github';
import fs from 'fs-extra';
import { SignJWT } from 'jose';
import { createPrivateKey, type KeyObject } from 'crypto';
import { AuthError, errorMessage } from './errors.js';

export interface Credential {
  token: string;
  expiresAt: Date;
  installationId: number;
}

export interface CredentialMinter {
  mint(installationId: number): Promise<Credential>;
}

// The slice of the Octokit client used for the token exchange
export interface InstallationTokenClient {
  rest: {
    apps: {
      createInstallationAccessToken(params: {
        installation_id: number;
      }): Promise<{ data: { token: string; expires_at: string } }>;
    };
  };
}

export interface AuthTokenProviderOptions {
  appId: string;
  privateKey: KeyObject;
  baseUrl?: string;
  createClient?: (appJwt: string) => InstallationTokenClient;
  now?: () => Date;
}

const APP_JWT_TTL_SECONDS = 10 * 60;

/**
 * Load a PEM private key (PKCS#1 or PKCS#8) from disk
 * @throws AuthError if the file is unreadable or not a private key
 */
export async function loadPrivateKey(keyPath: string): Promise<KeyObject> {
  let pem: string;
  try {
    pem = await fs.readFile(keyPath, 'utf-8');
  } catch (error) {
    throw new AuthError(`Failed to read private key at ${keyPath}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return createPrivateKey({ key: pem, format: 'pem' });
  } catch (error) {
    throw new AuthError(`Failed to parse private key at ${keyPath}: ${errorMessage(error)}`, { cause: error });
  }
}

export class AuthTokenProvider implements CredentialMinter {
  private appId: string;
  private privateKey: KeyObject;
  private createClient: (appJwt: string) => InstallationTokenClient;
  private now: () => Date;

  constructor(options: AuthTokenProviderOptions) {
    this.appId = options.appId;
    this.privateKey = options.privateKey;
    this.createClient =
      options.createClient ?? (appJwt => getOctokit(appJwt, { baseUrl: options.baseUrl }));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build the RS256 app assertion (iat = now, exp = now + 10 minutes)
   */
  async createAppJwt(): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    try {
      return await new SignJWT({})
        .setProtectedHeader({ alg: 'RS256' })
        .setIssuer(this.appId)
        .setIssuedAt(issuedAt)
        .setExpirationTime(issuedAt + APP_JWT_TTL_SECONDS)
        .sign(this.privateKey);
    } catch (error) {
      throw new AuthError(`Failed to sign app JWT: ${errorMessage(error)}`, { cause: error });
    }
  }

  async mint(installationId: number): Promise<Credential> {
    const appJwt = await this.createAppJwt();

    try {
      const { data } = await this.createClient(appJwt).rest.apps.createInstallationAccessToken({
        installation_id: installationId
      });
      return {
        token: data.token,
        expiresAt: new Date(data.expires_at),
        installationId
      };
    } catch (error) {
      throw new AuthError(
        `Failed to get access token for installation ${installationId}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
