/**
 * Pull request actions that should trigger a fresh conflict check.
 */
export type GitHubPullRequestAction = "opened" | "reopened" | "synchronize";

/**
 * Installation actions that change which repositories docwatch can reach.
 */
export type GitHubInstallationAction =
  | "created"
  | "deleted"
  | "suspend"
  | "unsuspend"
  | "new_permissions_accepted";

/**
 * Repository selection changes on an existing installation.
 */
export type GitHubInstallationRepositoriesAction = "added" | "removed";

/**
 * GitHub user or organisation reference.
 */
export interface GitHubActor {
  id: number;
  login: string;
}

/**
 * Repository shape shared by webhook payloads and REST responses.
 *
 * `fork` and `owner` are absent from installation events.
 */
export interface GitHubRepository {
  id: number;
  name: string;
  /**
   * Repository full name in `owner/name` format.
   */
  full_name: string;
  fork?: boolean;
  owner?: GitHubActor;
}

/**
 * Pull request as listed by `GET /repos/{owner}/{repo}/pulls`.
 */
export interface GitHubPullRequest {
  id: number;
  /**
   * Pull request number in the target repository.
   */
  number: number;
  state: string;
  title: string;
  user: GitHubActor;
  /**
   * Web URL of the pull request, referenced from conflict comments.
   */
  html_url: string;
  created_at: string;
  updated_at: string;
}

/**
 * GitHub App installation as listed by `GET /app/installations`.
 */
export interface GitHubInstallation {
  id: number;
  account: GitHubActor;
  app_id: number;
}

/**
 * `pull_request` webhook payload shape consumed by docwatch.
 */
export interface GitHubPullRequestWebhookEvent {
  /**
   * GitHub action type for the pull request event.
   */
  action: string;
  number: number;
  pull_request: GitHubPullRequest;
  repository: GitHubRepository;
  /**
   * Pull request events only carry the installation id.
   */
  installation: {
    id: number;
  };
  sender: GitHubActor;
}

/**
 * `installation` webhook payload shape consumed by docwatch.
 */
export interface GitHubInstallationWebhookEvent {
  action: string;
  installation: GitHubInstallation;
  sender: GitHubActor;
  /**
   * Repositories granted at creation time. Omitted for some actions.
   */
  repositories?: GitHubRepository[];
}

/**
 * `installation_repositories` webhook payload shape consumed by docwatch.
 */
export interface GitHubInstallationRepositoriesWebhookEvent {
  action: string;
  installation: GitHubInstallation;
  sender: GitHubActor;
  repositories_added: GitHubRepository[];
  repositories_removed: GitHubRepository[];
}
