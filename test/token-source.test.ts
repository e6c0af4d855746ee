import { describe, expect, test, vi } from "vitest";
import { RefreshError } from "../src/errors.js";
import {
  AutoRefreshingTokenSource,
  isExpired,
} from "../src/oauth/token-source.js";
import type { Credential } from "../src/types.js";
import { makeCredential, MemoryCredentialStore } from "./fixtures/memory-store.js";

const NOW = 1_000_000;

describe("isExpired", () => {
  test("treats credentials inside the leeway window as expired", () => {
    expect(isExpired(makeCredential({ expiresAt: NOW + 5_000 }), NOW)).toBe(true);
    expect(isExpired(makeCredential({ expiresAt: NOW + 60_000 }), NOW)).toBe(
      false
    );
  });
});

describe("AutoRefreshingTokenSource", () => {
  test("returns an unexpired credential unchanged and persists it once", async () => {
    const credential = makeCredential({ expiresAt: NOW + 3_600_000 });
    const store = new MemoryCredentialStore();
    const refresh = vi.fn<(c: Credential) => Promise<Credential>>();
    const source = new AutoRefreshingTokenSource({
      credential,
      refresh,
      store,
      now: () => NOW,
    });

    const token = await source.token();

    expect(token.accessToken).toBe("access-1");
    expect(refresh).not.toHaveBeenCalled();
    expect(store.saved).toEqual([credential]);
  });

  test("refreshes an expired credential, persists it and reuses it afterwards", async () => {
    const expired = makeCredential({ expiresAt: NOW - 1 });
    const refreshed = makeCredential({
      accessToken: "access-2",
      expiresAt: NOW + 3_600_000,
    });
    const store = new MemoryCredentialStore(expired);
    const refresh = vi.fn((_: Credential) => Promise.resolve(refreshed));
    const source = new AutoRefreshingTokenSource({
      credential: expired,
      refresh,
      store,
      now: () => NOW,
    });

    const first = await source.token();
    const second = await source.token();

    expect(first.accessToken).toBe("access-2");
    expect(second.accessToken).toBe("access-2");
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(refresh).toHaveBeenCalledWith(expired);
    expect(store.current).toEqual(refreshed);
    expect(store.saved).toHaveLength(2);
    expect(source.current()).toEqual(refreshed);
  });

  test("concurrent callers share one refresh", async () => {
    const expired = makeCredential({ expiresAt: NOW - 1 });
    const refreshed = makeCredential({
      accessToken: "access-2",
      expiresAt: NOW + 3_600_000,
    });
    const refresh = vi.fn(
      (_: Credential) =>
        new Promise<Credential>((resolve) => {
          setTimeout(() => resolve(refreshed), 10);
        })
    );
    const source = new AutoRefreshingTokenSource({
      credential: expired,
      refresh,
      store: new MemoryCredentialStore(),
      now: () => NOW,
    });

    const tokens = await Promise.all([source.token(), source.token()]);

    expect(tokens.map((token) => token.accessToken)).toEqual([
      "access-2",
      "access-2",
    ]);
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  test("refresh failures propagate unchanged and nothing is persisted", async () => {
    const expired = makeCredential({ expiresAt: NOW - 1 });
    const failure = new RefreshError("Token request failed (400): invalid_grant", {
      invalidGrant: true,
    });
    const store = new MemoryCredentialStore();
    const source = new AutoRefreshingTokenSource({
      credential: expired,
      refresh: () => Promise.reject(failure),
      store,
      now: () => NOW,
    });

    await expect(source.token()).rejects.toBe(failure);
    expect(store.saved).toEqual([]);
    expect(source.current()).toEqual(expired);
  });
});
