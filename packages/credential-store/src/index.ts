import {
  createGitHubAppJwt,
  exchangeInstallationAccessToken,
  type GitHubApiOptions,
  type GitHubAppJwt,
  type GitHubInstallationAccessToken,
} from "@docwatch/github-client";

/**
 * Margin subtracted from GitHub's installation token expiry so a token is
 * never handed out moments before it lapses.
 */
export const INSTALLATION_TOKEN_SAFETY_MARGIN_MS = 5 * 60 * 1000;

/**
 * What a cached token authenticates as.
 */
export type TokenKind =
  | { readonly type: "jwt" }
  | { readonly type: "installation"; readonly installationId: number };

/**
 * A cached credential and its validity window `[createdAt, expiresAt)`.
 */
export interface Token {
  readonly value: string;
  readonly kind: TokenKind;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  /** Epoch milliseconds; the token is unusable from this instant on. */
  readonly expiresAt: number;
}

/**
 * Whether a token may still be used at `now`.
 */
export function isTokenUsable(token: Token, now: number): boolean {
  return now < token.expiresAt;
}

/**
 * Base class for credential failures.
 */
export class AuthError extends Error {
  /**
   * Whether retrying the calling operation later may succeed.
   */
  public readonly transient: boolean;

  public constructor(message: string, transient: boolean, cause?: unknown) {
    super(message, { cause });
    this.name = "AuthError";
    this.transient = transient;
  }
}

/**
 * The app private key could not sign a JWT. Configuration error; retrying
 * does not help.
 */
export class SigningKeyError extends AuthError {
  public readonly appId: number;

  public constructor(appId: number, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to sign GitHub App JWT for app ${appId}: ${details}`, false, cause);
    this.name = "SigningKeyError";
    this.appId = appId;
  }
}

/**
 * Exchanging the app JWT for an installation token failed, including
 * timeouts. May succeed on a later attempt.
 */
export class TokenExchangeError extends AuthError {
  public readonly installationId: number;

  public constructor(installationId: number, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(
      `Unable to obtain access token for installation ${installationId}: ${details}`,
      true,
      cause,
    );
    this.name = "TokenExchangeError";
    this.installationId = installationId;
  }
}

/**
 * Signs an app JWT. Swappable for tests.
 */
export type SignAppJwt = (options: {
  appId: number;
  privateKeyPem: string;
  nowSeconds: number;
}) => GitHubAppJwt;

/**
 * Exchanges an app JWT for an installation token. Swappable for tests.
 */
export type ExchangeInstallationToken = (
  appJwt: string,
  installationId: number,
  options: GitHubApiOptions,
) => Promise<GitHubInstallationAccessToken>;

/**
 * Construction options for {@link CredentialStore}.
 */
export interface CredentialStoreOptions {
  /**
   * GitHub App identifier, used as the JWT issuer.
   */
  readonly appId: number;
  /**
   * PEM-encoded RSA private key of the app.
   */
  readonly privateKeyPem: string;
  /**
   * Options forwarded to the token exchange request.
   */
  readonly apiOptions?: GitHubApiOptions;
  /**
   * Clock in epoch milliseconds.
   */
  readonly now?: () => number;
  readonly signJwt?: SignAppJwt;
  readonly exchangeToken?: ExchangeInstallationToken;
}

/**
 * Owns the app signing key and every token derived from it.
 *
 * @remarks
 * Tokens are cached per {@link TokenKind} and minted again once expired.
 * Concurrent misses for one installation share a single exchange request,
 * and the exchange runs outside any cache mutation so unrelated
 * installations never wait on each other. An exchange that finishes after
 * {@link CredentialStore.evictInstallation} is discarded.
 *
 * One instance is created at process start and passed to every handler.
 */
export class CredentialStore {
  private readonly appId: number;
  private readonly privateKeyPem: string;
  private readonly apiOptions: GitHubApiOptions;
  private readonly now: () => number;
  private readonly signJwt: SignAppJwt;
  private readonly exchangeToken: ExchangeInstallationToken;

  private readonly tokens = new Map<string, Token>();
  private readonly pendingExchanges = new Map<number, Promise<string>>();
  /** Bumped on eviction so late exchange results can be recognised. */
  private readonly evictionEpochs = new Map<number, number>();

  public constructor(options: CredentialStoreOptions) {
    this.appId = options.appId;
    this.privateKeyPem = options.privateKeyPem;
    this.apiOptions = options.apiOptions ?? {};
    this.now = options.now ?? Date.now;
    this.signJwt = options.signJwt ?? createGitHubAppJwt;
    this.exchangeToken = options.exchangeToken ?? exchangeInstallationAccessToken;
  }

  /**
   * Returns a usable app JWT, signing a new one when needed.
   *
   * @throws {@link SigningKeyError} when the private key cannot sign.
   */
  public getJwt(): string {
    const kind: TokenKind = { type: "jwt" };
    const cached = this.cachedToken(kind);
    if (cached) {
      return cached;
    }

    const nowMs = this.now();
    let jwt: GitHubAppJwt;
    try {
      jwt = this.signJwt({
        appId: this.appId,
        privateKeyPem: this.privateKeyPem,
        nowSeconds: Math.floor(nowMs / 1000),
      });
    } catch (error) {
      throw new SigningKeyError(this.appId, error);
    }

    this.tokens.set(tokenKey(kind), {
      value: jwt.token,
      kind,
      createdAt: jwt.issuedAt * 1000,
      expiresAt: jwt.expiresAt * 1000,
    });
    return jwt.token;
  }

  /**
   * Returns a usable installation token, exchanging the app JWT when needed.
   *
   * @param installationId - Installation to authenticate as.
   * @throws {@link SigningKeyError} when the JWT cannot be signed.
   * @throws {@link TokenExchangeError} when the exchange request fails.
   */
  public async getInstallationToken(installationId: number): Promise<string> {
    const cached = this.cachedToken({ type: "installation", installationId });
    if (cached) {
      return cached;
    }

    const pending = this.pendingExchanges.get(installationId);
    if (pending) {
      return pending;
    }

    const exchange = this.mintInstallationToken(installationId).finally(() => {
      if (this.pendingExchanges.get(installationId) === exchange) {
        this.pendingExchanges.delete(installationId);
      }
    });
    this.pendingExchanges.set(installationId, exchange);
    return exchange;
  }

  /**
   * Forgets the installation's cached token and any exchange in flight.
   */
  public evictInstallation(installationId: number): void {
    this.tokens.delete(tokenKey({ type: "installation", installationId }));
    this.pendingExchanges.delete(installationId);
    this.evictionEpochs.set(installationId, this.epochOf(installationId) + 1);
  }

  /**
   * Drops every cached token.
   */
  public invalidateAll(): void {
    const installationIds = new Set(this.pendingExchanges.keys());
    for (const token of this.tokens.values()) {
      if (token.kind.type === "installation") {
        installationIds.add(token.kind.installationId);
      }
    }

    for (const installationId of installationIds) {
      this.evictInstallation(installationId);
    }
    this.tokens.clear();
  }

  /**
   * Snapshot of a cached token, usable or not.
   */
  public peek(kind: TokenKind): Token | undefined {
    return this.tokens.get(tokenKey(kind));
  }

  private async mintInstallationToken(installationId: number): Promise<string> {
    const epochAtStart = this.epochOf(installationId);
    const jwt = this.getJwt();

    let response: GitHubInstallationAccessToken;
    try {
      response = await this.exchangeToken(jwt, installationId, this.apiOptions);
    } catch (error) {
      throw new TokenExchangeError(installationId, error);
    }

    const expiresAtMs = Date.parse(response.expires_at);
    if (!Number.isFinite(expiresAtMs)) {
      throw new TokenExchangeError(
        installationId,
        new Error(`Invalid expires_at value "${response.expires_at}"`),
      );
    }

    const kind: TokenKind = { type: "installation", installationId };
    const token: Token = {
      value: response.token,
      kind,
      createdAt: this.now(),
      expiresAt: expiresAtMs - INSTALLATION_TOKEN_SAFETY_MARGIN_MS,
    };

    if (this.epochOf(installationId) === epochAtStart) {
      this.tokens.set(tokenKey(kind), token);
    }
    return token.value;
  }

  private cachedToken(kind: TokenKind): string | null {
    const token = this.tokens.get(tokenKey(kind));
    if (token && isTokenUsable(token, this.now())) {
      return token.value;
    }
    return null;
  }

  private epochOf(installationId: number): number {
    return this.evictionEpochs.get(installationId) ?? 0;
  }
}

function tokenKey(kind: TokenKind): string {
  return kind.type === "jwt" ? "jwt" : `installation:${kind.installationId}`;
}
