import { describe, expect, test } from "vitest";

import { CredentialStore } from "@docwatch/credential-store";
import type { GitHubInstallation, GitHubRepository } from "@docwatch/shared-types";

import {
  InstallationRegistry,
  NoCredentialsForRepoError,
  type InstallationCredentials,
} from "./index";

function createInstallation(id: number, login: string): GitHubInstallation {
  return { id, account: { id: id * 10, login }, app_id: 42 };
}

function createRepository(fullName: string): GitHubRepository {
  const name = fullName.split("/")[1] ?? fullName;
  return { id: fullName.length, name, full_name: fullName };
}

function createCredentialsSpy() {
  const evicted: number[] = [];
  const requested: number[] = [];
  const credentials: InstallationCredentials = {
    evictInstallation: (installationId) => {
      evicted.push(installationId);
    },
    getInstallationToken: async (installationId) => {
      requested.push(installationId);
      return `token-${installationId}`;
    },
  };
  return { credentials, evicted, requested };
}

describe("InstallationRegistry", () => {
  test("resolves the installation that lists a repository", () => {
    const registry = new InstallationRegistry(createCredentialsSpy().credentials);
    registry.register(createInstallation(1, "acme"), [createRepository("acme/wiki")]);
    registry.register(createInstallation(2, "globex"), [
      createRepository("globex/docs"),
      createRepository("globex/site"),
    ]);

    expect(registry.resolveInstallation("globex/site")).toBe(2);
    expect(registry.resolveInstallation("acme/wiki")).toBe(1);
    expect(registry.resolveInstallation("acme/other")).toBeNull();
  });

  test("matches full names exactly", () => {
    const registry = new InstallationRegistry(createCredentialsSpy().credentials);
    registry.register(createInstallation(1, "acme"), [createRepository("acme/wiki")]);

    expect(registry.resolveInstallation("acme/wiki2")).toBeNull();
    expect(registry.resolveInstallation("ACME/wiki")).toBeNull();
  });

  test("re-registration replaces the repository list", () => {
    const registry = new InstallationRegistry(createCredentialsSpy().credentials);
    const installation = createInstallation(1, "acme");
    registry.register(installation, [createRepository("acme/wiki")]);
    registry.register(installation, [createRepository("acme/docs")]);

    expect(registry.size).toBe(1);
    expect(registry.resolveInstallation("acme/wiki")).toBeNull();
    expect(registry.resolveInstallation("acme/docs")).toBe(1);
  });

  test("register copies the repository list", () => {
    const registry = new InstallationRegistry(createCredentialsSpy().credentials);
    const repositories = [createRepository("acme/wiki")];
    registry.register(createInstallation(1, "acme"), repositories);
    repositories.push(createRepository("acme/docs"));

    expect(registry.get(1)?.repositories).toHaveLength(1);
  });

  test("remove deletes the entry and evicts its token", () => {
    const spy = createCredentialsSpy();
    const registry = new InstallationRegistry(spy.credentials);
    registry.register(createInstallation(1, "acme"), [createRepository("acme/wiki")]);

    expect(registry.remove(1)).toBe(true);
    expect(registry.remove(1)).toBe(false);
    expect(registry.resolveInstallation("acme/wiki")).toBeNull();
    expect(spy.evicted).toEqual([1, 1]);
  });

  test("requireInstallation throws NoCredentialsForRepoError on a miss", () => {
    const registry = new InstallationRegistry(createCredentialsSpy().credentials);

    expect(() => registry.requireInstallation("acme/wiki")).toThrow(NoCredentialsForRepoError);
    expect(() => registry.requireInstallation("acme/wiki")).toThrow(
      "No GitHub installation found for repository acme/wiki",
    );
  });

  test("tokenForRepository asks for the resolved installation's token", async () => {
    const spy = createCredentialsSpy();
    const registry = new InstallationRegistry(spy.credentials);
    registry.register(createInstallation(3, "acme"), [createRepository("acme/wiki")]);

    expect(await registry.tokenForRepository("acme/wiki")).toBe("token-3");
    expect(spy.requested).toEqual([3]);
    await expect(registry.tokenForRepository("acme/docs")).rejects.toBeInstanceOf(
      NoCredentialsForRepoError,
    );
  });

  test("a removed installation never reuses its pre-removal token", async () => {
    let exchangeCount = 0;
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => Date.parse("2025-06-01T12:00:00Z"),
      signJwt: ({ nowSeconds }) => ({
        token: "jwt",
        issuedAt: nowSeconds - 60,
        expiresAt: nowSeconds + 420,
      }),
      exchangeToken: async (_appJwt, installationId) => {
        exchangeCount += 1;
        return {
          token: `installation-${installationId}-${exchangeCount}`,
          expires_at: "2025-06-01T13:00:00Z",
          permissions: {},
        };
      },
    });
    const registry = new InstallationRegistry(store);
    const installation = createInstallation(8, "acme");
    registry.register(installation, [createRepository("acme/wiki")]);

    const before = await registry.tokenForRepository("acme/wiki");
    registry.remove(8);
    registry.register(installation, [createRepository("acme/wiki")]);
    const after = await registry.tokenForRepository("acme/wiki");

    expect(before).toBe("installation-8-1");
    expect(after).toBe("installation-8-2");
  });
});
