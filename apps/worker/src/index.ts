import { readFileSync } from "node:fs";

import type { DocwatchConfig } from "@docwatch/config-loader";
import {
  comparePullRequests,
  parsePatchSet,
  renderConflictComment,
} from "@docwatch/conflict-detector";
import { AuthError, CredentialStore } from "@docwatch/credential-store";
import {
  fetchPullRequestDiff,
  listAppInstallations,
  listInstallationRepositories,
  listOpenPullRequests,
  postIssueComment,
  sleep,
  withRetry,
  type GitHubApiOptions,
} from "@docwatch/github-client";
import { InstallationRegistry } from "@docwatch/installation-registry";
import type { InMemoryJobQueue } from "@docwatch/job-store";
import type {
  CheckPullRequestJob,
  Conflict,
  DiffedPullRequest,
  DocwatchJob,
  GitHubInstallation,
  GitHubPullRequest,
  RegisterInstallationJob,
  RemoveInstallationJob,
} from "@docwatch/shared-types";

/**
 * Runtime configuration for the worker.
 */
export interface WorkerConfig {
  /**
   * GitHub App identifier.
   */
  appId: number;
  /**
   * PEM-encoded RSA private key of the app.
   */
  privateKeyPem: string;
  /**
   * Interval in milliseconds between queue drains.
   */
  pollIntervalMs: number;
  /**
   * Maximum count of posted-comment keys retained in memory.
   */
  maxProcessedKeys: number;
  githubApiBaseUrl: string;
  githubWebBaseUrl: string;
  githubUserAgent: string;
  githubRequestTimeoutMs: number;
  /**
   * Retries for idempotent GitHub reads.
   */
  githubFetchRetries: number;
  /**
   * Base backoff delay between retries.
   */
  githubRetryDelayMs: number;
  /**
   * Log conflicts instead of posting comments.
   */
  dryRun: boolean;
}

/**
 * Loads worker runtime configuration from environment variables.
 *
 * @remarks
 * The private key comes from `GITHUB_APP_PRIVATE_KEY` (escaped `\n`
 * sequences are expanded) or from the file named by
 * `GITHUB_APP_PRIVATE_KEY_PATH`.
 *
 * @returns Validated worker configuration.
 */
export function loadConfig(): WorkerConfig {
  const appIdRaw = process.env.GITHUB_APP_ID ?? "";
  const appId = Number.parseInt(appIdRaw, 10);
  if (!/^\d+$/.test(appIdRaw) || appId <= 0) {
    throw new Error(`Invalid GITHUB_APP_ID value: ${appIdRaw || "<unset>"}`);
  }

  return {
    appId,
    privateKeyPem: loadPrivateKey(),
    pollIntervalMs: readIntegerEnv("WORKER_POLL_INTERVAL_MS", 3000, 250),
    maxProcessedKeys: readIntegerEnv("WORKER_MAX_PROCESSED_KEYS", 10_000, 100),
    githubApiBaseUrl: process.env.GITHUB_API_BASE_URL ?? "https://api.github.com",
    githubWebBaseUrl: process.env.GITHUB_WEB_BASE_URL ?? "https://github.com",
    githubUserAgent: process.env.GITHUB_USER_AGENT ?? "docwatch-worker",
    githubRequestTimeoutMs: readIntegerEnv("GITHUB_REQUEST_TIMEOUT_MS", 10_000, 100),
    githubFetchRetries: readIntegerEnv("GITHUB_FETCH_RETRIES", 2, 0),
    githubRetryDelayMs: readIntegerEnv("GITHUB_RETRY_DELAY_MS", 250, 0),
    dryRun: process.env.DOCWATCH_DRY_RUN === "1" || process.env.DOCWATCH_DRY_RUN === "true",
  };
}

function readIntegerEnv(name: string, defaultValue: number, minimum: number): number {
  const raw = process.env[name] ?? String(defaultValue);
  const value = Number.parseInt(raw, 10);

  if (!/^\d+$/.test(raw.trim()) || value < minimum) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }

  return value;
}

function loadPrivateKey(): string {
  const inlineKey = process.env.GITHUB_APP_PRIVATE_KEY;
  if (inlineKey) {
    return inlineKey.replace(/\\n/g, "\n");
  }

  const keyPath = process.env.GITHUB_APP_PRIVATE_KEY_PATH;
  if (keyPath) {
    return readFileSync(keyPath, "utf8");
  }

  throw new Error("Missing GITHUB_APP_PRIVATE_KEY or GITHUB_APP_PRIVATE_KEY_PATH");
}

/**
 * Maps worker configuration onto GitHub client options.
 */
export function toGitHubApiOptions(config: WorkerConfig): GitHubApiOptions {
  return {
    apiBaseUrl: config.githubApiBaseUrl,
    webBaseUrl: config.githubWebBaseUrl,
    userAgent: config.githubUserAgent,
    requestTimeoutMs: config.githubRequestTimeoutMs,
  };
}

/**
 * GitHub operations used by the worker. Swappable for tests.
 */
export interface WorkerGitHubClient {
  readonly listAppInstallations: typeof listAppInstallations;
  readonly listInstallationRepositories: typeof listInstallationRepositories;
  readonly listOpenPullRequests: typeof listOpenPullRequests;
  readonly fetchPullRequestDiff: typeof fetchPullRequestDiff;
  readonly postIssueComment: typeof postIssueComment;
}

const defaultGitHubClient: WorkerGitHubClient = {
  listAppInstallations,
  listInstallationRepositories,
  listOpenPullRequests,
  fetchPullRequestDiff,
  postIssueComment,
};

/**
 * In-memory state for posted-comment key tracking.
 *
 * @remarks
 * Properties are `readonly` to prevent reference reassignment. The underlying
 * collections are mutated in place by {@link trackProcessedKey}.
 */
export interface ProcessedKeyState {
  /** Set of currently tracked keys for O(1) lookup. Mutated by trackProcessedKey. */
  readonly keys: Set<string>;
  /** Insertion-ordered list for FIFO eviction. Mutated by trackProcessedKey. */
  readonly order: string[];
}

/**
 * Creates a fresh empty processed key tracking state.
 */
export function createProcessedKeyState(): ProcessedKeyState {
  return { keys: new Set(), order: [] };
}

/**
 * Tracks a processed key while enforcing a fixed-size in-memory cap.
 *
 * @remarks
 * Oldest keys are evicted first once `maxKeys` is exceeded, allowing
 * long-running worker processes to stay memory-bounded.
 *
 * @param key - Key of a completed side effect.
 * @param state - Mutable tracking state.
 * @param maxKeys - Maximum number of keys to retain.
 */
export function trackProcessedKey(
  key: string,
  state: ProcessedKeyState,
  maxKeys: number,
): void {
  if (state.keys.has(key)) {
    return;
  }

  state.keys.add(key);
  state.order.push(key);

  while (state.order.length > maxKeys) {
    const evicted = state.order.shift();
    if (evicted) {
      state.keys.delete(evicted);
    }
  }
}

/**
 * Builds the deduplication key of a conflict comment.
 *
 * @remarks
 * Comment posting is not idempotent, so the worker posts a given conflict on
 * a given pull request at most once per process lifetime.
 *
 * @param repositoryFullName - Repository full name in `owner/name` format.
 * @param conflict - Conflict about to be posted.
 * @returns Key in `repo#trigger:kind:original:files` format.
 */
export function buildCommentKey(repositoryFullName: string, conflict: Conflict): string {
  return (
    `${repositoryFullName}#${conflict.trigger}:${conflict.kind}` +
    `:${conflict.original}:${conflict.fileSet.join(",")}`
  );
}

/**
 * Shared state and collaborators handed to every job.
 */
export interface WorkerContext {
  readonly config: WorkerConfig;
  readonly docwatchConfig: DocwatchConfig;
  readonly credentials: CredentialStore;
  readonly registry: InstallationRegistry;
  readonly postedCommentKeys: ProcessedKeyState;
  readonly github: WorkerGitHubClient;
  /**
   * Info logger for operational events.
   */
  readonly logInfo: (message: string) => void;
  /**
   * Error logger for failures.
   */
  readonly logError: (message: string) => void;
  /**
   * Sleep used between retries.
   */
  readonly sleep: (delayMs: number) => Promise<void>;
}

/**
 * Optional collaborator overrides for {@link createWorkerContext}.
 */
export interface WorkerContextOverrides {
  readonly credentials?: CredentialStore;
  readonly github?: Partial<WorkerGitHubClient>;
  readonly logInfo?: (message: string) => void;
  readonly logError?: (message: string) => void;
  readonly sleep?: (delayMs: number) => Promise<void>;
}

/**
 * Creates the long-lived worker context: one credential store and one
 * installation registry for the whole process.
 */
export function createWorkerContext(
  config: WorkerConfig,
  docwatchConfig: DocwatchConfig,
  overrides: WorkerContextOverrides = {},
): WorkerContext {
  const credentials =
    overrides.credentials ??
    new CredentialStore({
      appId: config.appId,
      privateKeyPem: config.privateKeyPem,
      apiOptions: toGitHubApiOptions(config),
    });

  return {
    config,
    docwatchConfig,
    credentials,
    registry: new InstallationRegistry(credentials),
    postedCommentKeys: createProcessedKeyState(),
    github: { ...defaultGitHubClient, ...overrides.github },
    logInfo: overrides.logInfo ?? console.log,
    logError: overrides.logError ?? console.error,
    sleep: overrides.sleep ?? sleep,
  };
}

function readWithRetry<Result>(
  context: WorkerContext,
  description: string,
  operation: () => Promise<Result>,
): Promise<Result> {
  return withRetry(operation, {
    retries: context.config.githubFetchRetries,
    delayMs: context.config.githubRetryDelayMs,
    sleep: context.sleep,
    onRetry: (attempt, error) => {
      context.logInfo(`[worker] retrying ${description} attempt=${attempt}: ${describeError(error)}`);
    },
  });
}

/**
 * Loads an installation's repositories and stores them in the registry.
 *
 * @param context - Worker context.
 * @param installation - Installation to (re)register.
 * @returns Number of repositories registered.
 */
export async function registerInstallation(
  context: WorkerContext,
  installation: GitHubInstallation,
): Promise<number> {
  const apiOptions = toGitHubApiOptions(context.config);
  const token = await context.credentials.getInstallationToken(installation.id);
  const repositories = await readWithRetry(
    context,
    `repositories installation=${installation.id}`,
    () => context.github.listInstallationRepositories(token, apiOptions),
  );

  context.registry.register(installation, repositories);
  context.logInfo(
    `[worker] registered installation=${installation.id} account=${installation.account.login} repositories=${repositories.length}`,
  );
  return repositories.length;
}

/**
 * Registers every installation of the app.
 *
 * @remarks
 * A failing installation is logged and skipped. Failing to list
 * installations at all, including a signing key error, is thrown.
 *
 * @param context - Worker context.
 * @returns Number of installations registered.
 */
export async function discoverInstallations(context: WorkerContext): Promise<number> {
  const apiOptions = toGitHubApiOptions(context.config);
  const jwt = context.credentials.getJwt();
  const installations = await readWithRetry(context, "installations", () =>
    context.github.listAppInstallations(jwt, apiOptions),
  );

  let registered = 0;
  for (const installation of installations) {
    try {
      await registerInstallation(context, installation);
      registered += 1;
    } catch (error) {
      context.logError(
        `[worker] failed to register installation=${installation.id}: ${describeError(error)}`,
      );
    }
  }

  return registered;
}

/**
 * Runs installation discovery at process start.
 *
 * @remarks
 * Only a permanent credential failure, such as a key that cannot sign, is
 * thrown. Any other failure is logged; installation events keep arriving and
 * the caller may run discovery again on a later cycle.
 *
 * @param context - Worker context.
 * @returns Number of installations registered, or `null` when discovery failed.
 */
export async function bootstrapInstallations(context: WorkerContext): Promise<number | null> {
  try {
    const registered = await discoverInstallations(context);
    context.logInfo(`[worker] discovered installations=${registered}`);
    return registered;
  } catch (error) {
    if (error instanceof AuthError && !error.transient) {
      throw error;
    }

    context.logError(`[worker] installation discovery failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * Applies an installation lifecycle job to the registry.
 */
export async function processInstallationJob(
  job: RegisterInstallationJob | RemoveInstallationJob,
  context: WorkerContext,
): Promise<void> {
  if (job.kind === "remove_installation") {
    const existed = context.registry.remove(job.installation_id);
    context.logInfo(
      `[worker] removed installation=${job.installation_id} known=${existed}`,
    );
    return;
  }

  // Permissions or repository selection may have changed with the event.
  context.credentials.evictInstallation(job.installation_id);
  await registerInstallation(context, {
    id: job.installation_id,
    account: { id: job.account_id, login: job.account_login },
    app_id: job.app_id,
  });
}

/**
 * Summary of one pull request conflict check.
 */
export interface CheckPullRequestSummary {
  readonly jobId: string;
  readonly repository: string;
  readonly pullRequestNumber: number;
  /**
   * Other open pull requests compared successfully.
   */
  readonly comparedPulls: number;
  /**
   * Other open pull requests skipped because their diff or comparison failed.
   */
  readonly failedPulls: readonly number[];
  /**
   * Every conflict found, across all compared pulls.
   */
  readonly conflicts: readonly Conflict[];
  readonly postedComments: number;
  /**
   * Conflicts already reported earlier, or withheld in dry-run mode.
   */
  readonly skippedComments: number;
  readonly failedComments: number;
  /**
   * UTC timestamp when processing completed.
   */
  readonly processedAt: string;
}

/**
 * Checks one pull request against every other open pull request and posts a
 * comment for each new conflict.
 *
 * @remarks
 * Reads are retried per the worker config. A failure to fetch or compare one
 * other pull request is logged and does not stop the others. Comment posting
 * is never retried and its failures never touch cached credentials.
 *
 * @param job - Check job.
 * @param context - Worker context.
 * @returns Deterministic summary of the check.
 * @throws {@link NoCredentialsForRepoError} when no installation covers the
 * repository.
 */
export async function processPullRequestJob(
  job: CheckPullRequestJob,
  context: WorkerContext,
): Promise<CheckPullRequestSummary> {
  const repository = job.repo_full_name;
  const apiOptions = toGitHubApiOptions(context.config);
  const articleOptions = context.docwatchConfig.articles;
  const token = await context.registry.tokenForRepository(repository);

  context.logInfo(`[worker] processing job=${job.job_id} repo=${repository} pr=${job.pr_number}`);

  const openPulls = await readWithRetry(context, `pulls repo=${repository}`, () =>
    context.github.listOpenPullRequests({
      ...apiOptions,
      repositoryFullName: repository,
      installationAccessToken: token,
    }),
  );

  const newPullRequest = openPulls.find((pull) => pull.number === job.pr_number);
  if (!newPullRequest) {
    context.logInfo(`[worker] pr=${job.pr_number} repo=${repository} is no longer open`);
    return buildSummary(job, 0, [], [], { posted: 0, skipped: 0, failed: 0 });
  }

  const fetchDiff = async (pull: GitHubPullRequest): Promise<DiffedPullRequest> => {
    const diffText = await readWithRetry(context, `diff repo=${repository} pr=${pull.number}`, () =>
      context.github.fetchPullRequestDiff({
        ...apiOptions,
        repositoryFullName: repository,
        pullRequestNumber: pull.number,
        installationAccessToken: token,
      }),
    );
    return { ...pull, diff: parsePatchSet(diffText) };
  };

  const newPull = await fetchDiff(newPullRequest);
  const conflicts: Conflict[] = [];
  const failedPulls: number[] = [];
  let comparedPulls = 0;

  for (const otherPullRequest of openPulls) {
    if (otherPullRequest.number === newPull.number) {
      continue;
    }

    try {
      const otherPull = await fetchDiff(otherPullRequest);
      conflicts.push(...comparePullRequests(newPull, otherPull, articleOptions));
      comparedPulls += 1;
    } catch (error) {
      failedPulls.push(otherPullRequest.number);
      context.logError(
        `[worker] comparison failed job=${job.job_id} pr=${newPull.number} other=${otherPullRequest.number}: ${describeError(error)}`,
      );
    }
  }

  const delivery = await deliverConflictComments(job, conflicts, token, context);
  const summary = buildSummary(job, comparedPulls, failedPulls, conflicts, delivery);
  context.logInfo(
    `[worker] summary job=${summary.jobId} compared=${summary.comparedPulls} conflicts=${summary.conflicts.length} posted=${summary.postedComments} skipped=${summary.skippedComments}`,
  );

  return summary;
}

type DeliveryCounts = {
  posted: number;
  skipped: number;
  failed: number;
};

async function deliverConflictComments(
  job: CheckPullRequestJob,
  conflicts: readonly Conflict[],
  token: string,
  context: WorkerContext,
): Promise<DeliveryCounts> {
  const counts: DeliveryCounts = { posted: 0, skipped: 0, failed: 0 };
  const apiOptions = toGitHubApiOptions(context.config);

  for (const conflict of conflicts) {
    const commentKey = buildCommentKey(job.repo_full_name, conflict);
    if (context.postedCommentKeys.keys.has(commentKey)) {
      counts.skipped += 1;
      continue;
    }

    if (context.config.dryRun) {
      context.logInfo(`[worker] dry-run conflict key=${commentKey}`);
      counts.skipped += 1;
      continue;
    }

    try {
      await context.github.postIssueComment({
        ...apiOptions,
        repositoryFullName: job.repo_full_name,
        issueNumber: conflict.trigger,
        installationAccessToken: token,
        body: renderConflictComment(conflict, {
          maxListedFiles: context.docwatchConfig.comments.maxListedFiles,
        }),
      });
      trackProcessedKey(commentKey, context.postedCommentKeys, context.config.maxProcessedKeys);
      counts.posted += 1;
    } catch (error) {
      counts.failed += 1;
      context.logError(
        `[worker] failed to post comment job=${job.job_id} key=${commentKey}: ${describeError(error)}`,
      );
    }
  }

  return counts;
}

function buildSummary(
  job: CheckPullRequestJob,
  comparedPulls: number,
  failedPulls: readonly number[],
  conflicts: readonly Conflict[],
  delivery: DeliveryCounts,
): CheckPullRequestSummary {
  return {
    jobId: job.job_id,
    repository: job.repo_full_name,
    pullRequestNumber: job.pr_number,
    comparedPulls,
    failedPulls,
    conflicts,
    postedComments: delivery.posted,
    skippedComments: delivery.skipped,
    failedComments: delivery.failed,
    processedAt: new Date().toISOString(),
  };
}

/**
 * Dispatches a job to its handler.
 */
export async function processJob(job: DocwatchJob, context: WorkerContext): Promise<void> {
  switch (job.kind) {
    case "check_pull_request":
      await processPullRequestJob(job, context);
      return;
    case "register_installation":
    case "remove_installation":
      await processInstallationJob(job, context);
      return;
  }
}

/**
 * Result of one queue drain.
 */
export interface DrainResult {
  readonly processed: number;
  readonly failed: number;
}

/**
 * Processes every queued job in order, isolating failures per job.
 *
 * @param queue - Queue to drain.
 * @param context - Worker context.
 */
export async function drainJobs(
  queue: InMemoryJobQueue,
  context: WorkerContext,
): Promise<DrainResult> {
  let processed = 0;
  let failed = 0;

  for (const job of queue.drain()) {
    try {
      await processJob(job, context);
      processed += 1;
    } catch (error) {
      failed += 1;
      const retryHint = error instanceof AuthError && error.transient ? " (transient)" : "";
      context.logError(
        `[worker] failed to process job=${job.job_id} kind=${job.kind}${retryHint}: ${describeError(error)}`,
      );
    }
  }

  return { processed, failed };
}

/**
 * Mutable guard preventing overlapping poll cycles.
 */
export interface PollCycleState {
  isPollInFlight: boolean;
}

/**
 * Runs one poll cycle unless the previous one is still in flight.
 *
 * @param state - Shared guard state.
 * @param runCycle - Cycle body.
 * @returns `true` when the cycle ran, `false` when it was skipped.
 */
export async function runPollCycleWithInFlightGuard(
  state: PollCycleState,
  runCycle: () => Promise<void>,
): Promise<boolean> {
  if (state.isPollInFlight) {
    return false;
  }

  state.isPollInFlight = true;
  try {
    await runCycle();
  } finally {
    state.isPollInFlight = false;
  }

  return true;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.stack ?? error.message : String(error);
}
