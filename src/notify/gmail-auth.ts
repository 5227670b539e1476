/**
 * Gmail OAuth
 *
 * Manages the OAuth 2.0 token used to send mail: reads the client secrets
 * downloaded from Google Cloud Console (`credentials.json`), caches the
 * user's token (`token.json`) and refreshes it when it expires.
 *
 * The first authorization is interactive (`donation-finder email auth`):
 * the user opens the consent URL, approves, and pastes back the code.
 *
 * @module notify/gmail-auth
 */

import { z } from 'zod';
import { TIMEOUTS } from '../config/index.js';
import { atomicWriteJson, fileExists, readJson } from '../storage/atomic.js';
import { describeError } from '../places/client.js';
import { silentLogger, type Logger } from '../logger.js';

// ============================================================================
// Constants
// ============================================================================

export const GMAIL_SCOPES = ['https://www.googleapis.com/auth/gmail.send'] as const;

export const AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';

export const TOKEN_URL = 'https://oauth2.googleapis.com/token';

/** Redirect used for the copy-paste flow; the browser shows the code in its address bar */
export const DEFAULT_REDIRECT_URI = 'http://localhost';

/** Tokens this close to expiry are refreshed before use */
export const EXPIRY_SKEW_MS = 60_000;

/**
 * Setup steps printed when credentials are missing.
 */
export const SETUP_INSTRUCTIONS = [
  'Go to Google Cloud Console (console.cloud.google.com)',
  'Create a new project or select an existing one',
  'Enable the Gmail API',
  'Create OAuth 2.0 credentials (Desktop app)',
  'Download the credentials file as credentials.json into this directory',
  'Run: donation-finder email auth',
] as const;

// ============================================================================
// Schemas
// ============================================================================

const ClientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * credentials.json as downloaded from Google Cloud Console.
 */
export const CredentialsFileSchema = z.union([
  z.object({ installed: ClientSecretsSchema }),
  z.object({ web: ClientSecretsSchema }),
]);

/**
 * Cached token (token.json).
 */
export const StoredTokenSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  /** Epoch milliseconds */
  expiresAt: z.number(),
  scope: z.string().optional(),
  tokenType: z.string().default('Bearer'),
});

export type StoredToken = z.infer<typeof StoredTokenSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

// ============================================================================
// Types
// ============================================================================

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface GmailAuthOptions {
  credentialsPath: string;
  tokenPath: string;
  logger?: Logger;
  /** Clock, replaceable in tests */
  now?: () => number;
  /** Override the token endpoint (tests) */
  tokenUrl?: string;
}

/**
 * Credentials are missing, unusable or rejected. `instructions` lists the
 * steps the user should take.
 */
export class AuthSetupError extends Error {
  constructor(
    message: string,
    public readonly instructions: readonly string[]
  ) {
    super(message);
    this.name = 'AuthSetupError';
  }
}

// ============================================================================
// GmailAuth
// ============================================================================

/**
 * Provides access tokens for the Gmail API.
 *
 * @example
 * ```typescript
 * const auth = new GmailAuth({ credentialsPath: 'credentials.json', tokenPath: 'token.json' });
 * const accessToken = await auth.getAccessToken();
 * ```
 */
export class GmailAuth {
  readonly credentialsPath: string;
  readonly tokenPath: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly tokenUrl: string;

  constructor(options: GmailAuthOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokenPath = options.tokenPath;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.tokenUrl = options.tokenUrl ?? TOKEN_URL;
  }

  hasCredentials(): Promise<boolean> {
    return fileExists(this.credentialsPath);
  }

  hasToken(): Promise<boolean> {
    return fileExists(this.tokenPath);
  }

  /**
   * Read the OAuth client id and secret.
   *
   * @throws AuthSetupError if credentials.json is missing or malformed
   */
  async loadCredentials(): Promise<ClientCredentials> {
    if (!(await this.hasCredentials())) {
      throw new AuthSetupError(
        `Gmail API credentials file '${this.credentialsPath}' not found`,
        SETUP_INSTRUCTIONS
      );
    }

    const parsed = CredentialsFileSchema.safeParse(await readJson(this.credentialsPath));
    if (!parsed.success) {
      throw new AuthSetupError(
        `Gmail API credentials file '${this.credentialsPath}' is not an OAuth client file`,
        SETUP_INSTRUCTIONS
      );
    }

    const secrets = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
    return {
      clientId: secrets.client_id,
      clientSecret: secrets.client_secret,
      redirectUri: secrets.redirect_uris?.[0] ?? DEFAULT_REDIRECT_URI,
    };
  }

  /**
   * Read the cached token, if any.
   *
   * A token file that is not valid JSON or not a token is ignored with a
   * warning, so the caller asks for authorization again.
   *
   * @returns The token, or undefined when token.json is missing or unusable
   */
  async loadToken(): Promise<StoredToken | undefined> {
    if (!(await this.hasToken())) {
      return undefined;
    }

    let data: unknown;
    try {
      data = await readJson(this.tokenPath);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable token file ${this.tokenPath}: ${describeError(error)}`);
      return undefined;
    }

    const parsed = StoredTokenSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Ignoring unreadable token file ${this.tokenPath}`);
      return undefined;
    }
    return parsed.data;
  }

  async saveToken(token: StoredToken): Promise<void> {
    await atomicWriteJson(this.tokenPath, token);
  }

  /**
   * Whether a token can be used without refreshing.
   */
  isFresh(token: StoredToken): boolean {
    return token.expiresAt - EXPIRY_SKEW_MS > this.now();
  }

  /**
   * Get a valid access token, refreshing the cached one if it has expired.
   *
   * @throws AuthSetupError when no usable token exists or refresh fails
   */
  async getAccessToken(): Promise<string> {
    const token = await this.loadToken();

    if (!token) {
      // Surfaces a missing credentials.json first
      await this.loadCredentials();
      throw new AuthSetupError('Gmail has not been authorized yet', ['Run: donation-finder email auth']);
    }

    if (this.isFresh(token)) {
      return token.accessToken;
    }

    if (!token.refreshToken) {
      throw new AuthSetupError('Gmail token has expired and cannot be refreshed', [
        'Run: donation-finder email auth',
      ]);
    }

    this.logger.debug('Refreshing Gmail access token');
    const refreshed = await this.refresh(token.refreshToken);
    return refreshed.accessToken;
  }

  /**
   * Exchange a refresh token for a new access token and update the cache.
   *
   * @throws AuthSetupError if the token endpoint rejects the request
   */
  async refresh(refreshToken: string): Promise<StoredToken> {
    const credentials = await this.loadCredentials();

    const token = await this.requestToken(
      {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
      },
      'Failed to refresh Gmail credentials'
    );

    const stored = { ...token, refreshToken: token.refreshToken ?? refreshToken };
    await this.saveToken(stored);
    return stored;
  }

  /**
   * Consent page URL for the copy-paste authorization flow.
   */
  buildConsentUrl(credentials: ClientCredentials): string {
    const params = new URLSearchParams({
      client_id: credentials.clientId,
      redirect_uri: credentials.redirectUri,
      response_type: 'code',
      scope: GMAIL_SCOPES.join(' '),
      access_type: 'offline',
      prompt: 'consent',
    });
    return `${AUTH_URL}?${params.toString()}`;
  }

  /**
   * Exchange an authorization code for tokens and cache them.
   *
   * @param input - The code, or the whole redirect URL containing it
   * @throws AuthSetupError if the code is rejected
   */
  async exchangeCode(input: string): Promise<StoredToken> {
    const credentials = await this.loadCredentials();
    const code = parseAuthCode(input);
    if (!code) {
      throw new AuthSetupError('No authorization code provided', ['Run: donation-finder email auth']);
    }

    const token = await this.requestToken(
      {
        grant_type: 'authorization_code',
        code,
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        redirect_uri: credentials.redirectUri,
      },
      'Failed to exchange authorization code'
    );

    await this.saveToken(token);
    this.logger.info(`Token saved to ${this.tokenPath}`);
    return token;
  }

  private async requestToken(params: Record<string, string>, failure: string): Promise<StoredToken> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), TIMEOUTS.gmail);

    let response: Response;
    try {
      response = await fetch(this.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(params).toString(),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = error instanceof Error && error.name === 'AbortError' ? 'request timed out' : String(error);
      throw new AuthSetupError(`${failure}: ${reason}`, ['Run: donation-finder email auth']);
    } finally {
      clearTimeout(timeoutId);
    }

    const body: unknown = await response.json().catch(() => ({}));

    if (!response.ok) {
      const parsedError = TokenErrorSchema.safeParse(body);
      const reason = parsedError.success
        ? parsedError.data.error_description ?? parsedError.data.error
        : `HTTP ${response.status}`;
      throw new AuthSetupError(`${failure}: ${reason}`, ['Run: donation-finder email auth']);
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthSetupError(`${failure}: unexpected token response`, ['Run: donation-finder email auth']);
    }

    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
      scope: parsed.data.scope,
      tokenType: parsed.data.token_type ?? 'Bearer',
    };
  }
}

/**
 * Pull the authorization code out of user input: either the bare code or
 * the redirect URL the browser landed on.
 *
 * @returns The code, or an empty string
 */
export function parseAuthCode(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    try {
      return new URL(trimmed).searchParams.get('code') ?? '';
    } catch {
      return '';
    }
  }
  return trimmed;
}
