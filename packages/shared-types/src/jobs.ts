/**
 * Queue job asking the worker to check one pull request against every other
 * open pull request in its repository.
 */
export interface CheckPullRequestJob {
  /**
   * Discriminant for the job union.
   */
  kind: "check_pull_request";
  /**
   * Stable unique identifier for this queue item.
   */
  job_id: string;
  /**
   * GitHub App installation id reported by the webhook.
   */
  installation_id: number;
  /**
   * Repository full name in `owner/name` format.
   */
  repo_full_name: string;
  /**
   * Pull request number in the repository.
   */
  pr_number: number;
  /**
   * ISO timestamp of the pull request's last update, used for idempotency.
   */
  updated_at: string;
  /**
   * ISO timestamp indicating when the job was queued.
   */
  queued_at: string;
}

/**
 * Queue job asking the worker to (re)load an installation's repositories.
 */
export interface RegisterInstallationJob {
  kind: "register_installation";
  job_id: string;
  installation_id: number;
  account_login: string;
  account_id: number;
  app_id: number;
  queued_at: string;
}

/**
 * Queue job asking the worker to forget an installation and its credentials.
 */
export interface RemoveInstallationJob {
  kind: "remove_installation";
  job_id: string;
  installation_id: number;
  queued_at: string;
}

/**
 * Every job the webhook intake can hand over to the worker.
 */
export type DocwatchJob =
  | CheckPullRequestJob
  | RegisterInstallationJob
  | RemoveInstallationJob;
