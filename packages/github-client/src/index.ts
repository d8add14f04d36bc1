import { createSign } from "node:crypto";

import type {
  GitHubInstallation,
  GitHubPullRequest,
  GitHubRepository,
} from "@docwatch/shared-types";

/**
 * Default GitHub REST API origin.
 */
export const DEFAULT_API_BASE_URL = "https://api.github.com";

/**
 * Default GitHub web origin. Pull request `.diff` links are served here,
 * not from the API origin.
 */
export const DEFAULT_WEB_BASE_URL = "https://github.com";

/**
 * Default value of the `User-Agent` header.
 */
export const DEFAULT_USER_AGENT = "docwatch-github-client";

/**
 * Default upper bound for one outbound request.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Lifetime of an app JWT, counted from the signing time.
 */
export const APP_JWT_LIFETIME_SECONDS = 7 * 60;

/**
 * Backdating applied to `iat` to tolerate clock drift with GitHub.
 */
export const APP_JWT_CLOCK_SKEW_SECONDS = 60;

/**
 * Runtime options for GitHub App JWT creation.
 */
export interface GitHubAppJwtOptions {
  /**
   * GitHub App identifier.
   */
  appId: number;
  /**
   * PEM-encoded RSA private key for signing the JWT.
   */
  privateKeyPem: string;
  /**
   * Optional current time override in seconds for deterministic testing.
   */
  nowSeconds?: number;
}

/**
 * Signed app JWT together with its validity window.
 */
export interface GitHubAppJwt {
  token: string;
  /**
   * `iat` claim in epoch seconds.
   */
  issuedAt: number;
  /**
   * `exp` claim in epoch seconds.
   */
  expiresAt: number;
}

/**
 * API configuration shared by every request.
 */
export interface GitHubApiOptions {
  /**
   * Base URL for GitHub API requests.
   *
   * @defaultValue `"https://api.github.com"`
   */
  apiBaseUrl?: string;
  /**
   * Base URL for github.com web requests (diff downloads).
   *
   * @defaultValue `"https://github.com"`
   */
  webBaseUrl?: string;
  /**
   * Value for the User-Agent header.
   *
   * @defaultValue `"docwatch-github-client"`
   */
  userAgent?: string;
  /**
   * Abort the request after this many milliseconds.
   *
   * @defaultValue `10000`
   */
  requestTimeoutMs?: number;
}

/**
 * Response payload returned by GitHub installation token exchange.
 */
export interface GitHubInstallationAccessToken {
  /**
   * Installation access token value.
   */
  token: string;
  /**
   * ISO timestamp for token expiration.
   */
  expires_at: string;
  /**
   * Repositories the token is scoped to, when the installation is limited.
   */
  repositories?: GitHubRepository[];
  /**
   * Granted permissions keyed by scope.
   */
  permissions: Record<string, string>;
}

/**
 * Request options for listing open pull requests.
 */
export interface ListOpenPullRequestsOptions extends GitHubApiOptions {
  /**
   * Repository full name in `owner/name` format.
   */
  repositoryFullName: string;
  /**
   * Installation access token used for API authentication.
   */
  installationAccessToken: string;
  /**
   * Maximum number of pages to fetch.
   *
   * @defaultValue `99`
   */
  maxPages?: number;
}

/**
 * Request options for downloading a pull request diff.
 */
export interface FetchPullRequestDiffOptions extends GitHubApiOptions {
  repositoryFullName: string;
  pullRequestNumber: number;
  installationAccessToken: string;
}

/**
 * Request options for posting an issue comment.
 */
export interface PostIssueCommentOptions extends GitHubApiOptions {
  /**
   * Repository full name in `owner/name` format.
   */
  repositoryFullName: string;
  /**
   * Issue or pull request number.
   */
  issueNumber: number;
  /**
   * Installation access token used for API authentication.
   */
  installationAccessToken: string;
  /**
   * Markdown comment body.
   */
  body: string;
}

/**
 * Response shape for created GitHub issue comments.
 */
export interface GitHubIssueComment {
  /**
   * Comment identifier.
   */
  id: number;
  /**
   * HTML URL for the comment.
   */
  html_url: string;
  /**
   * Stored markdown body.
   */
  body: string;
}

/**
 * Error representing a non-success GitHub response.
 */
export class GitHubApiError extends Error {
  /**
   * HTTP status code returned by GitHub.
   */
  public readonly status: number;
  /**
   * HTTP method used for the failed request.
   */
  public readonly method: string;
  /**
   * Request URL for the failed request.
   */
  public readonly url: string;
  /**
   * Raw response body text for diagnostics.
   */
  public readonly responseBody: string;

  /**
   * Creates a typed GitHub API error.
   *
   * @param status - HTTP status code.
   * @param method - Request method.
   * @param url - Request URL.
   * @param responseBody - Raw response body.
   */
  public constructor(
    status: number,
    method: string,
    url: string,
    responseBody: string,
  ) {
    super(`GitHub API request failed: ${method} ${url} (${status})`);
    this.name = "GitHubApiError";
    this.status = status;
    this.method = method;
    this.url = url;
    this.responseBody = responseBody;
  }
}

/**
 * Error representing a request that never produced a response: DNS or
 * connection failures, resets and timeouts.
 */
export class GitHubNetworkError extends Error {
  public readonly method: string;
  public readonly url: string;
  /**
   * Whether the request was aborted by `requestTimeoutMs`.
   */
  public readonly timedOut: boolean;

  public constructor(method: string, url: string, timedOut: boolean, cause: unknown) {
    const reason = timedOut ? "timed out" : "failed before a response";
    super(`GitHub request ${reason}: ${method} ${url}`, { cause });
    this.name = "GitHubNetworkError";
    this.method = method;
    this.url = url;
    this.timedOut = timedOut;
  }
}

/**
 * Creates a GitHub App JWT signed with RS256.
 *
 * @remarks
 * `iat` is backdated by one minute and `exp` lies seven minutes after the
 * signing time, inside GitHub's ten minute ceiling.
 *
 * @param options - JWT creation options.
 * @returns Signed compact JWT and its claims window.
 * @throws When the private key cannot be used for signing.
 */
export function createGitHubAppJwt(options: GitHubAppJwtOptions): GitHubAppJwt {
  const nowSeconds = options.nowSeconds ?? Math.floor(Date.now() / 1000);
  const issuedAt = nowSeconds - APP_JWT_CLOCK_SKEW_SECONDS;
  const expiresAt = nowSeconds + APP_JWT_LIFETIME_SECONDS;

  const jwtHeader = { alg: "RS256", typ: "JWT" };
  const jwtPayload = {
    iat: issuedAt,
    exp: expiresAt,
    iss: String(options.appId),
  };

  const encodedHeader = toBase64Url(JSON.stringify(jwtHeader));
  const encodedPayload = toBase64Url(JSON.stringify(jwtPayload));
  const signingInput = `${encodedHeader}.${encodedPayload}`;
  const signer = createSign("RSA-SHA256");
  signer.update(signingInput);
  signer.end();
  const signature = signer.sign(options.privateKeyPem, "base64url");

  return { token: `${signingInput}.${signature}`, issuedAt, expiresAt };
}

/**
 * Exchanges an app JWT for an installation access token.
 *
 * @param appJwt - GitHub App JWT.
 * @param installationId - Installation identifier.
 * @param options - Optional API configuration.
 * @returns Installation access token payload.
 * @throws {@link GitHubApiError} when GitHub returns a non-success status.
 * @throws {@link GitHubNetworkError} on transport failure or timeout.
 */
export async function exchangeInstallationAccessToken(
  appJwt: string,
  installationId: number,
  options: GitHubApiOptions = {},
): Promise<GitHubInstallationAccessToken> {
  const endpointUrl = `${apiBase(options)}/app/installations/${installationId}/access_tokens`;
  const response = await sendRequest(endpointUrl, "POST", options, {
    authorization: `Bearer ${appJwt}`,
    userAgent: options.userAgent,
  });

  return parseJsonResponse<GitHubInstallationAccessToken>(response, "POST", endpointUrl);
}

/**
 * Lists every installation of the authenticated app.
 *
 * @param appJwt - GitHub App JWT.
 * @param options - Optional API configuration.
 * @returns Installations in API order.
 */
export async function listAppInstallations(
  appJwt: string,
  options: GitHubApiOptions = {},
): Promise<GitHubInstallation[]> {
  const perPage = 100;
  const collected: GitHubInstallation[] = [];

  for (let pageNumber = 1; pageNumber <= 20; pageNumber += 1) {
    const endpointUrl = `${apiBase(options)}/app/installations?per_page=${perPage}&page=${pageNumber}`;
    const response = await sendRequest(endpointUrl, "GET", options, {
      authorization: `Bearer ${appJwt}`,
      userAgent: options.userAgent,
    });
    const page = await parseJsonResponse<GitHubInstallation[]>(response, "GET", endpointUrl);
    collected.push(...page);

    if (page.length < perPage) {
      break;
    }
  }

  return collected;
}

/**
 * Lists the repositories an installation token can reach.
 *
 * @param installationAccessToken - Installation token.
 * @param options - Optional API configuration.
 * @returns Repositories in API order.
 */
export async function listInstallationRepositories(
  installationAccessToken: string,
  options: GitHubApiOptions = {},
): Promise<GitHubRepository[]> {
  const perPage = 100;
  const collected: GitHubRepository[] = [];

  for (let pageNumber = 1; pageNumber <= 20; pageNumber += 1) {
    const endpointUrl = `${apiBase(options)}/installation/repositories?per_page=${perPage}&page=${pageNumber}`;
    const response = await sendRequest(endpointUrl, "GET", options, {
      authorization: `Bearer ${installationAccessToken}`,
      userAgent: options.userAgent,
    });
    const page = await parseJsonResponse<{ total_count: number; repositories: GitHubRepository[] }>(
      response,
      "GET",
      endpointUrl,
    );
    collected.push(...page.repositories);

    if (page.repositories.length < perPage) {
      break;
    }
  }

  return collected;
}

/**
 * Lists open pull requests, oldest first.
 *
 * @remarks
 * Pages are requested until one comes back empty, up to `maxPages`.
 *
 * @param options - Listing options.
 * @returns Open pull requests across all fetched pages, in page order.
 * @throws {@link GitHubApiError} when GitHub returns a non-success status.
 */
export async function listOpenPullRequests(
  options: ListOpenPullRequestsOptions,
): Promise<GitHubPullRequest[]> {
  const maxPages = options.maxPages ?? 99;
  const collected: GitHubPullRequest[] = [];

  for (let pageNumber = 1; pageNumber <= maxPages; pageNumber += 1) {
    const endpointUrl =
      `${apiBase(options)}/repos/${encodeFullName(options.repositoryFullName)}/pulls` +
      `?state=open&direction=asc&sort=created&per_page=100&page=${pageNumber}`;
    const response = await sendRequest(endpointUrl, "GET", options, {
      authorization: `Bearer ${options.installationAccessToken}`,
      userAgent: options.userAgent,
    });
    const page = await parseJsonResponse<GitHubPullRequest[]>(response, "GET", endpointUrl);

    if (page.length === 0) {
      break;
    }
    collected.push(...page);
  }

  return collected;
}

/**
 * Downloads the unified diff of a pull request from the web origin.
 *
 * @param options - Diff request options.
 * @returns Raw diff text.
 * @throws {@link GitHubApiError} when GitHub returns a non-success status.
 */
export async function fetchPullRequestDiff(
  options: FetchPullRequestDiffOptions,
): Promise<string> {
  const webBaseUrl = trimTrailingSlash(options.webBaseUrl ?? DEFAULT_WEB_BASE_URL);
  const endpointUrl =
    `${webBaseUrl}/${encodeFullName(options.repositoryFullName)}` +
    `/pull/${options.pullRequestNumber}.diff`;
  const response = await sendRequest(endpointUrl, "GET", options, {
    authorization: `Bearer ${options.installationAccessToken}`,
    userAgent: options.userAgent,
  });

  if (!response.ok) {
    throw new GitHubApiError(response.status, "GET", endpointUrl, await response.text());
  }
  return response.text();
}

/**
 * Posts a comment on an issue or pull request conversation.
 *
 * @param options - Comment request options.
 * @returns Created issue comment payload.
 * @throws {@link GitHubApiError} when GitHub returns a non-success status.
 */
export async function postIssueComment(
  options: PostIssueCommentOptions,
): Promise<GitHubIssueComment> {
  const endpointUrl =
    `${apiBase(options)}/repos/${encodeFullName(options.repositoryFullName)}` +
    `/issues/${options.issueNumber}/comments`;
  const response = await sendRequest(
    endpointUrl,
    "POST",
    options,
    {
      authorization: `Bearer ${options.installationAccessToken}`,
      userAgent: options.userAgent,
      contentType: "application/json",
    },
    JSON.stringify({ body: options.body }),
  );

  return parseJsonResponse<GitHubIssueComment>(response, "POST", endpointUrl);
}

/**
 * Retry policy for idempotent requests.
 */
export interface RetryOptions {
  /**
   * Additional attempts after the first failure.
   */
  retries: number;
  /**
   * Base delay; attempt `n` waits `delayMs * n`.
   */
  delayMs: number;
  /**
   * Sleep override for tests.
   */
  sleep?: (delayMs: number) => Promise<void>;
  /**
   * Called before each retry with the failure that caused it.
   */
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Runs an idempotent GitHub operation with bounded linear backoff.
 *
 * @remarks
 * Only failures accepted by {@link isRetryableGitHubError} are retried.
 * Never wrap non-idempotent writes such as comment posting.
 *
 * @param operation - Operation to run.
 * @param options - Retry policy.
 * @returns The first successful result.
 * @throws The last failure once retries are exhausted, or the first
 * non-retryable failure.
 */
export async function withRetry<Result>(
  operation: () => Promise<Result>,
  options: RetryOptions,
): Promise<Result> {
  const sleepFn = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.retries || !isRetryableGitHubError(error)) {
        throw error;
      }

      options.onRetry?.(attempt + 1, error);
      await sleepFn(options.delayMs * (attempt + 1));
    }
  }
}

/**
 * Classifies failures worth retrying: server errors, rate limiting and
 * transport failures.
 */
export function isRetryableGitHubError(error: unknown): boolean {
  if (error instanceof GitHubNetworkError) {
    return true;
  }

  if (!(error instanceof GitHubApiError)) {
    return false;
  }

  if (error.status >= 500 || error.status === 429) {
    return true;
  }

  return error.status === 403 && /rate limit/i.test(error.responseBody);
}

/**
 * Resolves after `delayMs` milliseconds.
 */
export function sleep(delayMs: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, delayMs);
  });
}

type HeaderBuildOptions = {
  authorization: string;
  userAgent?: string;
  contentType?: string;
};

function buildHeaders(options: HeaderBuildOptions): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    Authorization: options.authorization,
    "X-GitHub-Api-Version": "2022-11-28",
    "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
  };

  if (options.contentType) {
    headers["Content-Type"] = options.contentType;
  }

  return headers;
}

async function sendRequest(
  endpointUrl: string,
  method: string,
  options: GitHubApiOptions,
  headerOptions: HeaderBuildOptions,
  body?: string,
): Promise<Response> {
  const requestTimeoutMs = resolveRequestTimeoutMs(options.requestTimeoutMs);

  try {
    return await fetch(endpointUrl, {
      method,
      headers: buildHeaders(headerOptions),
      body,
      signal: AbortSignal.timeout(requestTimeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    throw new GitHubNetworkError(method, endpointUrl, timedOut, error);
  }
}

function resolveRequestTimeoutMs(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }

  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid requestTimeoutMs value: ${value}`);
  }

  return value;
}

function apiBase(options: GitHubApiOptions): string {
  return trimTrailingSlash(options.apiBaseUrl ?? DEFAULT_API_BASE_URL);
}

function encodeFullName(fullName: string): string {
  return fullName.split("/").map(encodeURIComponent).join("/");
}

function toBase64Url(value: string): string {
  return Buffer.from(value, "utf8").toString("base64url");
}

function trimTrailingSlash(value: string): string {
  return value.endsWith("/") ? value.slice(0, -1) : value;
}

async function parseJsonResponse<ResponseValue>(
  response: Response,
  method: string,
  requestUrl: string,
): Promise<ResponseValue> {
  if (!response.ok) {
    const responseBody = await response.text();
    throw new GitHubApiError(response.status, method, requestUrl, responseBody);
  }

  return (await response.json()) as ResponseValue;
}
