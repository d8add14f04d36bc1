import type { CredentialStore } from "@docwatch/credential-store";
import type { GitHubInstallation, GitHubRepository } from "@docwatch/shared-types";

/**
 * Installation together with the repositories it grants access to.
 */
export interface RegisteredInstallation extends GitHubInstallation {
  readonly repositories: readonly GitHubRepository[];
}

/**
 * Credential operations the registry relies on.
 */
export type InstallationCredentials = Pick<
  CredentialStore,
  "evictInstallation" | "getInstallationToken"
>;

/**
 * Error raised when no known installation covers a repository.
 */
export class NoCredentialsForRepoError extends Error {
  /**
   * Repository full name in `owner/name` format.
   */
  public readonly repositoryFullName: string;

  public constructor(repositoryFullName: string) {
    super(`No GitHub installation found for repository ${repositoryFullName}`);
    this.name = "NoCredentialsForRepoError";
    this.repositoryFullName = repositoryFullName;
  }
}

/**
 * Maps installations to the repositories they can reach.
 *
 * @remarks
 * GitHub guarantees each repository belongs to one installation of the app,
 * so resolution returns the first match. Removing an installation also
 * evicts its cached token.
 */
export class InstallationRegistry {
  private readonly installations = new Map<number, RegisteredInstallation>();
  private readonly credentials: InstallationCredentials;

  public constructor(credentials: InstallationCredentials) {
    this.credentials = credentials;
  }

  /**
   * Stores or replaces an installation and its repository list.
   */
  public register(
    installation: GitHubInstallation,
    repositories: readonly GitHubRepository[],
  ): RegisteredInstallation {
    const registered: RegisteredInstallation = {
      id: installation.id,
      account: installation.account,
      app_id: installation.app_id,
      repositories: [...repositories],
    };
    this.installations.set(installation.id, registered);
    return registered;
  }

  /**
   * Forgets an installation and evicts its token.
   *
   * @returns `true` when the installation was registered.
   */
  public remove(installationId: number): boolean {
    const existed = this.installations.delete(installationId);
    this.credentials.evictInstallation(installationId);
    return existed;
  }

  /**
   * Finds the installation that covers a repository.
   *
   * @param repositoryFullName - Repository full name in `owner/name` format.
   * @returns Installation id, or `null` when none matches.
   */
  public resolveInstallation(repositoryFullName: string): number | null {
    for (const installation of this.installations.values()) {
      if (installation.repositories.some((repository) => repository.full_name === repositoryFullName)) {
        return installation.id;
      }
    }
    return null;
  }

  /**
   * Like {@link InstallationRegistry.resolveInstallation} but throws on a miss.
   *
   * @throws {@link NoCredentialsForRepoError}
   */
  public requireInstallation(repositoryFullName: string): number {
    const installationId = this.resolveInstallation(repositoryFullName);
    if (installationId === null) {
      throw new NoCredentialsForRepoError(repositoryFullName);
    }
    return installationId;
  }

  /**
   * Returns an installation token for the installation covering a repository.
   *
   * @throws {@link NoCredentialsForRepoError} when no installation matches.
   */
  public async tokenForRepository(repositoryFullName: string): Promise<string> {
    const installationId = this.requireInstallation(repositoryFullName);
    return this.credentials.getInstallationToken(installationId);
  }

  public get(installationId: number): RegisteredInstallation | undefined {
    return this.installations.get(installationId);
  }

  public list(): RegisteredInstallation[] {
    return [...this.installations.values()];
  }

  public get size(): number {
    return this.installations.size;
  }
}
