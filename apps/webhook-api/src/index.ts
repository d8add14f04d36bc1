import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";

import type {
  CheckPullRequestJob,
  DocwatchJob,
  GitHubInstallationAction,
  GitHubInstallationRepositoriesAction,
  GitHubInstallationRepositoriesWebhookEvent,
  GitHubInstallationWebhookEvent,
  GitHubPullRequestAction,
  GitHubPullRequestWebhookEvent,
  RegisterInstallationJob,
  RemoveInstallationJob,
} from "@docwatch/shared-types";

/**
 * Supported GitHub pull request actions that should queue a conflict check.
 */
export const SUPPORTED_PULL_REQUEST_ACTIONS: ReadonlySet<string> = new Set<string>([
  "opened",
  "reopened",
  "synchronize",
] satisfies GitHubPullRequestAction[]);

/**
 * Installation actions that (re)register an installation.
 */
const REGISTERING_INSTALLATION_ACTIONS: ReadonlySet<string> = new Set<string>([
  "created",
  "unsuspend",
  "new_permissions_accepted",
] satisfies GitHubInstallationAction[]);

/**
 * Installation actions that remove an installation.
 */
const REMOVING_INSTALLATION_ACTIONS: ReadonlySet<string> = new Set<string>([
  "deleted",
  "suspend",
] satisfies GitHubInstallationAction[]);

/**
 * Supported installation_repositories actions.
 */
export const SUPPORTED_INSTALLATION_REPOSITORIES_ACTIONS: ReadonlySet<string> = new Set<string>([
  "added",
  "removed",
] satisfies GitHubInstallationRepositoriesAction[]);

/**
 * Runtime configuration for the webhook API service.
 */
export interface WebhookApiConfig {
  /**
   * HTTP port for server binding.
   */
  port: number;
  /**
   * Optional webhook secret used for `x-hub-signature-256` verification.
   */
  webhookSecret?: string;
}

/**
 * Resolves API runtime configuration from environment variables.
 *
 * @returns Validated runtime config with defaults applied.
 */
export function loadConfig(): WebhookApiConfig {
  const portRaw = process.env.WEBHOOK_PORT ?? "8787";
  const port = Number.parseInt(portRaw, 10);

  if (Number.isNaN(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid WEBHOOK_PORT value: ${portRaw}`);
  }

  const webhookSecret = process.env.GITHUB_WEBHOOK_SECRET;
  return { port, webhookSecret };
}

/**
 * Calculates GitHub HMAC SHA-256 signature for a raw request body.
 *
 * @param payload - Raw webhook request body.
 * @param secret - Shared webhook secret.
 * @returns GitHub-formatted signature value (`sha256=<hex>`).
 */
export function computeGitHubSignature(payload: string, secret: string): string {
  const digest = createHmac("sha256", secret).update(payload).digest("hex");
  return `sha256=${digest}`;
}

/**
 * Validates the GitHub webhook signature if a secret is configured.
 *
 * @param payload - Raw webhook payload.
 * @param signatureHeader - `x-hub-signature-256` header from GitHub.
 * @param secret - Optional secret; when unset, verification is skipped.
 * @returns `true` if signature is valid or verification is disabled.
 */
export function isWebhookSignatureValid(
  payload: string,
  signatureHeader: string | null,
  secret?: string,
): boolean {
  if (!secret) {
    return true;
  }

  if (!signatureHeader) {
    return false;
  }

  const expectedBuffer = Buffer.from(computeGitHubSignature(payload, secret), "utf8");
  const providedBuffer = Buffer.from(signatureHeader, "utf8");

  if (expectedBuffer.length !== providedBuffer.length) {
    return false;
  }

  return timingSafeEqual(expectedBuffer, providedBuffer);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function hasNumericId(value: unknown): boolean {
  return isObject(value) && typeof value.id === "number";
}

/**
 * Narrowly validates that a payload looks like the pull request webhook shape.
 *
 * @param payload - Parsed JSON payload.
 * @returns `true` when required fields are present.
 */
export function isPullRequestWebhookEvent(
  payload: unknown,
): payload is GitHubPullRequestWebhookEvent {
  if (!isObject(payload)) {
    return false;
  }

  const { repository, pull_request: pullRequest } = payload;
  return (
    typeof payload.action === "string" &&
    isObject(repository) &&
    typeof repository.full_name === "string" &&
    isObject(pullRequest) &&
    typeof pullRequest.number === "number" &&
    typeof pullRequest.updated_at === "string" &&
    hasNumericId(payload.installation)
  );
}

/**
 * Validates the `installation` event shape.
 */
export function isInstallationWebhookEvent(
  payload: unknown,
): payload is GitHubInstallationWebhookEvent {
  if (!isObject(payload)) {
    return false;
  }

  const installation: Record<string, unknown> = isObject(payload.installation)
    ? payload.installation
    : {};
  const account: Record<string, unknown> = isObject(installation.account) ? installation.account : {};
  return (
    typeof payload.action === "string" &&
    typeof installation.id === "number" &&
    typeof installation.app_id === "number" &&
    typeof account.id === "number" &&
    typeof account.login === "string"
  );
}

/**
 * Validates the `installation_repositories` event shape.
 */
export function isInstallationRepositoriesWebhookEvent(
  payload: unknown,
): payload is GitHubInstallationRepositoriesWebhookEvent {
  return (
    isObject(payload) &&
    Array.isArray(payload.repositories_added) &&
    Array.isArray(payload.repositories_removed) &&
    isInstallationWebhookEvent(payload)
  );
}

/**
 * Converts a pull request webhook event into a queue job payload.
 *
 * @param payload - Parsed and validated pull request webhook event.
 * @returns Local queue job payload.
 */
export function buildCheckPullRequestJob(
  payload: Pick<GitHubPullRequestWebhookEvent, "installation" | "pull_request" | "repository">,
): CheckPullRequestJob {
  return {
    kind: "check_pull_request",
    job_id: randomUUID(),
    installation_id: payload.installation.id,
    repo_full_name: payload.repository.full_name,
    pr_number: payload.pull_request.number,
    updated_at: payload.pull_request.updated_at,
    queued_at: new Date().toISOString(),
  };
}

/**
 * Converts an installation lifecycle event into a queue job payload.
 *
 * @param payload - Installation or installation_repositories event.
 * @param removal - Whether the installation should be forgotten.
 */
export function buildInstallationJob(
  payload: Pick<GitHubInstallationWebhookEvent, "installation">,
  removal: boolean,
): RegisterInstallationJob | RemoveInstallationJob {
  const queuedAt = new Date().toISOString();

  if (removal) {
    return {
      kind: "remove_installation",
      job_id: randomUUID(),
      installation_id: payload.installation.id,
      queued_at: queuedAt,
    };
  }

  return {
    kind: "register_installation",
    job_id: randomUUID(),
    installation_id: payload.installation.id,
    account_id: payload.installation.account.id,
    account_login: payload.installation.account.login,
    app_id: payload.installation.app_id,
    queued_at: queuedAt,
  };
}

/**
 * Outcome of mapping a webhook delivery onto a job.
 */
export type WebhookJobResolution =
  | { outcome: "job"; job: DocwatchJob }
  | { outcome: "ignored"; reason: string }
  | { outcome: "invalid"; errorCode: string; message: string };

/**
 * Events the intake accepts; everything else is acknowledged and ignored.
 */
export const SUPPORTED_EVENTS: ReadonlySet<string> = new Set([
  "pull_request",
  "installation",
  "installation_repositories",
]);

/**
 * Maps a parsed webhook payload onto the job it should queue.
 *
 * @param eventName - `x-github-event` header value.
 * @param payload - Parsed JSON body.
 */
export function resolveWebhookJob(eventName: string, payload: unknown): WebhookJobResolution {
  switch (eventName) {
    case "pull_request": {
      if (!isPullRequestWebhookEvent(payload)) {
        return invalidPayload(eventName);
      }
      if (!SUPPORTED_PULL_REQUEST_ACTIONS.has(payload.action)) {
        return { outcome: "ignored", reason: "pull_request_action_ignored" };
      }
      return { outcome: "job", job: buildCheckPullRequestJob(payload) };
    }
    case "installation": {
      if (!isInstallationWebhookEvent(payload)) {
        return invalidPayload(eventName);
      }
      if (REGISTERING_INSTALLATION_ACTIONS.has(payload.action)) {
        return { outcome: "job", job: buildInstallationJob(payload, false) };
      }
      if (REMOVING_INSTALLATION_ACTIONS.has(payload.action)) {
        return { outcome: "job", job: buildInstallationJob(payload, true) };
      }
      return { outcome: "ignored", reason: "installation_action_ignored" };
    }
    case "installation_repositories": {
      if (!isInstallationRepositoriesWebhookEvent(payload)) {
        return invalidPayload(eventName);
      }
      if (!SUPPORTED_INSTALLATION_REPOSITORIES_ACTIONS.has(payload.action)) {
        return { outcome: "ignored", reason: "installation_repositories_action_ignored" };
      }
      // Repository selection changed: registering again re-lists repositories.
      return { outcome: "job", job: buildInstallationJob(payload, false) };
    }
    default:
      return { outcome: "ignored", reason: "event_ignored" };
  }
}

function invalidPayload(eventName: string): WebhookJobResolution {
  return {
    outcome: "invalid",
    errorCode: `unsupported_${eventName}_payload`,
    message: `Unsupported ${eventName} payload`,
  };
}

/**
 * Returns request ID from inbound header or generates a new one.
 *
 * @param request - Incoming HTTP request.
 */
export function getRequestId(request: Request): string {
  const requestId = request.headers.get("x-request-id")?.trim();
  return requestId ? requestId : randomUUID();
}

/**
 * Creates a JSON response that always carries `x-request-id`.
 *
 * @param body - JSON response body.
 * @param status - HTTP status code.
 * @param requestId - Request correlation id.
 */
export function createWebhookJsonResponse(
  body: Record<string, unknown>,
  status: number,
  requestId: string,
): Response {
  return Response.json(body, {
    status,
    headers: { "x-request-id": requestId },
  });
}

/**
 * Creates the standard error envelope response.
 *
 * @param code - Machine-readable error code.
 * @param message - Human-readable error message.
 * @param status - HTTP status code.
 * @param requestId - Request correlation id.
 */
export function createWebhookErrorResponse(
  code: string,
  message: string,
  status: number,
  requestId: string,
): Response {
  return createWebhookJsonResponse(
    {
      status: "error",
      request_id: requestId,
      error: { code, message },
    },
    status,
    requestId,
  );
}

/**
 * Structured failure log entry for webhook requests.
 */
export interface WebhookFailureLog {
  event: "webhook_request_failed";
  request_id: string;
  http_status: number;
  error_code: string;
  message: string;
  github_event?: string | null;
  repository_full_name?: string;
  job_id?: string;
  cause?: string;
}

/**
 * Emits a one-line JSON failure log to stderr.
 */
export function logWebhookFailure(entry: WebhookFailureLog): void {
  console.error(JSON.stringify(entry));
}

/**
 * Dependencies of {@link createWebhookHandler}.
 */
export interface WebhookHandlerOptions {
  readonly config: WebhookApiConfig;
  /**
   * Hands a job to the worker; throwing maps to HTTP 503.
   */
  readonly enqueue: (job: DocwatchJob) => void;
}

/**
 * Creates the fetch-style webhook request handler.
 *
 * @param options - Handler dependencies.
 * @returns Handler mapping a request to its intake response.
 */
export function createWebhookHandler(
  options: WebhookHandlerOptions,
): (request: Request) => Promise<Response> {
  const { config, enqueue } = options;

  return async (request: Request): Promise<Response> => {
    const requestId = getRequestId(request);
    const eventName = request.headers.get("x-github-event");

    const fail = (httpStatus: number, errorCode: string, message: string): Response => {
      logWebhookFailure({
        event: "webhook_request_failed",
        request_id: requestId,
        http_status: httpStatus,
        error_code: errorCode,
        message,
        github_event: eventName,
      });
      return createWebhookErrorResponse(errorCode, message, httpStatus, requestId);
    };

    if (request.method === "GET" && new URL(request.url).pathname === "/health") {
      return createWebhookJsonResponse({ status: "ok", request_id: requestId }, 200, requestId);
    }

    if (request.method !== "POST") {
      return fail(405, "method_not_allowed", "Method Not Allowed");
    }

    if (!eventName || !SUPPORTED_EVENTS.has(eventName)) {
      return createWebhookJsonResponse(
        { status: "ignored", request_id: requestId, reason: "event_ignored" },
        202,
        requestId,
      );
    }

    const rawBody = await request.text();
    const signatureHeader = request.headers.get("x-hub-signature-256");
    if (!isWebhookSignatureValid(rawBody, signatureHeader, config.webhookSecret)) {
      return fail(401, "invalid_signature", "Invalid signature");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      return fail(400, "invalid_json_payload", "Invalid JSON payload");
    }

    const resolution = resolveWebhookJob(eventName, payload);
    if (resolution.outcome === "invalid") {
      return fail(400, resolution.errorCode, resolution.message);
    }
    if (resolution.outcome === "ignored") {
      return createWebhookJsonResponse(
        { status: "ignored", request_id: requestId, reason: resolution.reason },
        202,
        requestId,
      );
    }

    const { job } = resolution;
    try {
      enqueue(job);
    } catch (error) {
      logWebhookFailure({
        event: "webhook_request_failed",
        request_id: requestId,
        http_status: 503,
        error_code: "queue_enqueue_failed",
        message: "Failed to queue job",
        github_event: eventName,
        repository_full_name: job.kind === "check_pull_request" ? job.repo_full_name : undefined,
        job_id: job.job_id,
        cause: error instanceof Error ? error.stack ?? error.message : String(error),
      });
      return createWebhookErrorResponse("queue_enqueue_failed", "Failed to queue job", 503, requestId);
    }

    console.log(
      JSON.stringify({
        event: "webhook_job_queued",
        request_id: requestId,
        job_id: job.job_id,
        job_kind: job.kind,
        installation_id: job.installation_id,
      }),
    );

    return createWebhookJsonResponse(
      {
        status: "queued",
        request_id: requestId,
        job_id: job.job_id,
        job_kind: job.kind,
      },
      200,
      requestId,
    );
  };
}
