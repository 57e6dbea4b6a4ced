/**
 * Registry bearer-token exchange.
 * @module auth/registry-auth
 */

import { DistError } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { NoOpLogger } from '../observability/index.js';

/**
 * `fetch`-compatible function.
 */
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Builds the scope string for full access to a remote.
 */
export function buildScope(remote: string): string {
  return `repository:${remote}:*`;
}

/**
 * Options for `RegistryAuth`.
 */
export interface RegistryAuthOptions {
  /** Registry base URL, e.g. `https://ghcr.io` */
  registryUrl: string;
  /** Long-lived user token exchanged for bearer tokens */
  userToken: SecretString | string;
  userAgent?: string;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Exchanges a user token for per-remote bearer tokens.
 *
 * Tokens are cached per remote for the life of the instance; concurrent
 * requests for the same remote share one exchange.
 */
export class RegistryAuth {
  private readonly registryUrl: string;
  private readonly userToken: SecretString;
  private readonly userAgent?: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly tokens = new Map<string, Promise<SecretString>>();

  constructor(options: RegistryAuthOptions) {
    this.registryUrl = options.registryUrl.replace(/\/+$/, '');
    this.userToken =
      typeof options.userToken === 'string' ? new SecretString(options.userToken) : options.userToken;
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? new NoOpLogger();
  }

  /**
   * Gets the bearer token for a remote.
   */
  async getToken(remote: string): Promise<SecretString> {
    let token = this.tokens.get(remote);
    if (!token) {
      token = this.fetchToken(remote);
      this.tokens.set(remote, token);
      // a failed exchange is not cached
      void token.catch(() => this.tokens.delete(remote));
    }
    return token;
  }

  private async fetchToken(remote: string): Promise<SecretString> {
    const tokenUrl = new URL(`${this.registryUrl}/token`);
    tokenUrl.searchParams.set('scope', buildScope(remote));

    const basicAuth = Buffer.from(`${remote}:${this.userToken.expose()}`).toString('base64');
    const headers: Record<string, string> = { 'Authorization': `Basic ${basicAuth}` };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    let response: Response;
    try {
      response = await this.fetchFn(tokenUrl.toString(), { method: 'GET', headers });
    } catch (error) {
      throw DistError.authFailed(
        `Token request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw DistError.authFailed(
        `Failed to get registry token for ${remote}: ${response.status}`,
        response.status
      );
    }

    const json: unknown = await response.json();
    const tokenValue = extractToken(json);
    if (!tokenValue) {
      throw DistError.authFailed('Token response missing token field');
    }

    this.logger.info(`Obtained registry token for ${remote}`);
    return new SecretString(tokenValue);
  }
}

function extractToken(json: unknown): string | undefined {
  if (typeof json !== 'object' || json === null) {
    return undefined;
  }
  const token = 'token' in json ? json.token : 'access_token' in json ? json.access_token : undefined;
  return typeof token === 'string' && token.length > 0 ? token : undefined;
}
