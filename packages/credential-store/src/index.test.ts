import { generateKeyPairSync } from "node:crypto";

import { describe, expect, test } from "vitest";

import type { GitHubInstallationAccessToken } from "@docwatch/github-client";
import { GitHubNetworkError } from "@docwatch/github-client";

import {
  AuthError,
  CredentialStore,
  isTokenUsable,
  SigningKeyError,
  TokenExchangeError,
  type ExchangeInstallationToken,
  type SignAppJwt,
} from "./index";

const START_MS = Date.parse("2025-06-01T12:00:00Z");

function createClock(startMs = START_MS) {
  let currentMs = startMs;
  return {
    now: () => currentMs,
    advance: (deltaMs: number) => {
      currentMs += deltaMs;
    },
  };
}

function createSigner() {
  let signCount = 0;
  const signJwt: SignAppJwt = ({ appId, nowSeconds }) => {
    signCount += 1;
    return {
      token: `jwt-${appId}-${signCount}`,
      issuedAt: nowSeconds - 60,
      expiresAt: nowSeconds + 420,
    };
  };
  return { signJwt, signCount: () => signCount };
}

function createExchange(expiresAt: string) {
  const requests: { appJwt: string; installationId: number }[] = [];
  const exchangeToken: ExchangeInstallationToken = async (appJwt, installationId) => {
    requests.push({ appJwt, installationId });
    const response: GitHubInstallationAccessToken = {
      token: `installation-${installationId}-${requests.length}`,
      expires_at: expiresAt,
      permissions: {},
    };
    return response;
  };
  return { exchangeToken, requests };
}

describe("CredentialStore.getJwt", () => {
  test("reuses the JWT inside its validity window", () => {
    const clock = createClock();
    const signer = createSigner();
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: clock.now,
      signJwt: signer.signJwt,
    });

    const first = store.getJwt();
    clock.advance(6 * 60 * 1000);
    const second = store.getJwt();

    expect(first).toBe("jwt-42-1");
    expect(second).toBe(first);
    expect(signer.signCount()).toBe(1);
  });

  test("signs exactly one new JWT once expired", () => {
    const clock = createClock();
    const signer = createSigner();
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: clock.now,
      signJwt: signer.signJwt,
    });

    store.getJwt();
    clock.advance(7 * 60 * 1000);
    const renewed = store.getJwt();
    const again = store.getJwt();

    expect(renewed).toBe("jwt-42-2");
    expect(again).toBe(renewed);
    expect(signer.signCount()).toBe(2);
  });

  test("records the claims window on the cached token", () => {
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: createSigner().signJwt,
    });

    store.getJwt();

    expect(store.peek({ type: "jwt" })).toMatchObject({
      createdAt: START_MS - 60_000,
      expiresAt: START_MS + 420_000,
    });
  });

  test("signs real RS256 tokens by default", () => {
    const keyPair = generateKeyPairSync("rsa", { modulusLength: 2048 });
    const store = new CredentialStore({
      appId: 7,
      privateKeyPem: keyPair.privateKey.export({ format: "pem", type: "pkcs1" }).toString(),
    });

    expect(store.getJwt().split(".")).toHaveLength(3);
  });

  test("surfaces bad key material as a non-transient SigningKeyError", () => {
    const store = new CredentialStore({ appId: 7, privateKeyPem: "not-a-key" });

    let thrownError: unknown;
    try {
      store.getJwt();
    } catch (error) {
      thrownError = error;
    }

    expect(thrownError).toBeInstanceOf(SigningKeyError);
    expect(thrownError).toBeInstanceOf(AuthError);
    expect((thrownError as SigningKeyError).transient).toBe(false);
  });
});

describe("CredentialStore.getInstallationToken", () => {
  test("caches the token and returns it without a second exchange", async () => {
    const clock = createClock();
    const exchange = createExchange("2025-06-01T13:00:00Z");
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: clock.now,
      signJwt: createSigner().signJwt,
      exchangeToken: exchange.exchangeToken,
    });

    const first = await store.getInstallationToken(9);
    clock.advance(30 * 60 * 1000);
    const second = await store.getInstallationToken(9);

    expect(first).toBe("installation-9-1");
    expect(second).toBe(first);
    expect(exchange.requests).toEqual([{ appJwt: "jwt-42-1", installationId: 9 }]);
  });

  test("applies the five minute safety margin to the expiry", async () => {
    const clock = createClock();
    const exchange = createExchange("2025-06-01T13:00:00Z");
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: clock.now,
      signJwt: createSigner().signJwt,
      exchangeToken: exchange.exchangeToken,
    });

    await store.getInstallationToken(9);
    const token = store.peek({ type: "installation", installationId: 9 });

    expect(token?.expiresAt).toBe(Date.parse("2025-06-01T12:55:00Z"));
    expect(token !== undefined && isTokenUsable(token, Date.parse("2025-06-01T12:54:59Z"))).toBe(
      true,
    );

    clock.advance(55 * 60 * 1000);
    const renewed = await store.getInstallationToken(9);

    expect(renewed).toBe("installation-9-2");
    expect(exchange.requests).toHaveLength(2);
  });

  test("coalesces concurrent misses into one exchange", async () => {
    const exchange = createExchange("2025-06-01T13:00:00Z");
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: createSigner().signJwt,
      exchangeToken: exchange.exchangeToken,
    });

    const tokens = await Promise.all([
      store.getInstallationToken(3),
      store.getInstallationToken(3),
      store.getInstallationToken(4),
    ]);

    expect(tokens).toEqual(["installation-3-1", "installation-3-1", "installation-4-2"]);
    expect(exchange.requests.map((request) => request.installationId)).toEqual([3, 4]);
  });

  test("wraps exchange failures in a transient TokenExchangeError", async () => {
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: createSigner().signJwt,
      exchangeToken: async () => {
        throw new GitHubNetworkError("POST", "https://api.github.com/x", true, null);
      },
    });

    let thrownError: unknown;
    try {
      await store.getInstallationToken(5);
    } catch (error) {
      thrownError = error;
    }

    expect(thrownError).toBeInstanceOf(TokenExchangeError);
    expect((thrownError as TokenExchangeError).transient).toBe(true);
    expect((thrownError as TokenExchangeError).installationId).toBe(5);
    expect((thrownError as TokenExchangeError).cause).toBeInstanceOf(GitHubNetworkError);
    expect(store.peek({ type: "installation", installationId: 5 })).toBeUndefined();
  });

  test("rejects an exchange response with an unparseable expiry", async () => {
    const exchange = createExchange("not-a-date");
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: createSigner().signJwt,
      exchangeToken: exchange.exchangeToken,
    });

    await expect(store.getInstallationToken(6)).rejects.toMatchObject({
      name: "TokenExchangeError",
      transient: true,
      installationId: 6,
      message: 'Unable to obtain access token for installation 6: Invalid expires_at value "not-a-date"',
    });
    expect(store.peek({ type: "installation", installationId: 6 })).toBeUndefined();

    await expect(store.getInstallationToken(6)).rejects.toBeInstanceOf(TokenExchangeError);
    expect(exchange.requests).toHaveLength(2);
  });

  test("does not exchange when the JWT cannot be signed", async () => {
    const exchange = createExchange("2025-06-01T13:00:00Z");
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "not-a-key",
      exchangeToken: exchange.exchangeToken,
    });

    await expect(store.getInstallationToken(5)).rejects.toBeInstanceOf(SigningKeyError);
    expect(exchange.requests).toHaveLength(0);
  });
});

describe("CredentialStore.evictInstallation", () => {
  test("forces a fresh exchange even while the old token is unexpired", async () => {
    const exchange = createExchange("2025-06-01T13:00:00Z");
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: createSigner().signJwt,
      exchangeToken: exchange.exchangeToken,
    });

    const before = await store.getInstallationToken(9);
    store.evictInstallation(9);
    const after = await store.getInstallationToken(9);

    expect(before).toBe("installation-9-1");
    expect(after).toBe("installation-9-2");
  });

  test("discards an exchange that completes after eviction", async () => {
    let releaseExchange: () => void = () => {};
    const exchangeGate = new Promise<void>((resolve) => {
      releaseExchange = resolve;
    });
    let exchangeCount = 0;
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: createSigner().signJwt,
      exchangeToken: async (_appJwt, installationId) => {
        exchangeCount += 1;
        const count = exchangeCount;
        if (count === 1) {
          await exchangeGate;
        }
        return {
          token: `installation-${installationId}-${count}`,
          expires_at: "2025-06-01T13:00:00Z",
          permissions: {},
        };
      },
    });

    const inFlight = store.getInstallationToken(9);
    store.evictInstallation(9);
    releaseExchange();

    expect(await inFlight).toBe("installation-9-1");
    expect(store.peek({ type: "installation", installationId: 9 })).toBeUndefined();
    expect(await store.getInstallationToken(9)).toBe("installation-9-2");
  });

  test("invalidateAll clears JWT and installation tokens", async () => {
    const signer = createSigner();
    const store = new CredentialStore({
      appId: 42,
      privateKeyPem: "test-key",
      now: () => START_MS,
      signJwt: signer.signJwt,
      exchangeToken: createExchange("2025-06-01T13:00:00Z").exchangeToken,
    });

    await store.getInstallationToken(1);
    store.invalidateAll();

    expect(store.peek({ type: "jwt" })).toBeUndefined();
    expect(store.peek({ type: "installation", installationId: 1 })).toBeUndefined();
    expect(store.getJwt()).toBe("jwt-42-2");
  });
});
