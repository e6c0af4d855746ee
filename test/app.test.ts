import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { obtainCredential, runController } from "../src/app.js";
import { loadConfig } from "../src/config/env.js";
import { ConfigError, CredentialCorruptError } from "../src/errors.js";
import type { TokenSource } from "../src/oauth/token-source.js";
import type { PlayerApi } from "../src/player/api.js";
import type { Credential, TransportAction } from "../src/types.js";
import { FakeKeySource, FakeMediaKeyHook } from "./fixtures/fake-inputs.js";
import { FakePlayer } from "./fixtures/fake-player.js";
import { makeCredential, MemoryCredentialStore } from "./fixtures/memory-store.js";

const NOW = 5_000_000;

const config = loadConfig({
  SPOTKEY_CLIENT_ID: "client",
  SPOTKEY_CLIENT_SECRET: "test-secret",
});

/** Asks the token source for a credential before every call, like the real client. */
class TokenCheckingPlayer implements PlayerApi {
  readonly player = new FakePlayer();
  readonly seenTokens: string[] = [];
  private readonly tokens: TokenSource;

  constructor(tokens: TokenSource) {
    this.tokens = tokens;
  }

  private async authorize() {
    const credential = await this.tokens.token();
    this.seenTokens.push(credential.accessToken);
  }

  async getPlaybackState() {
    await this.authorize();
    return this.player.getPlaybackState();
  }

  async transport(action: TransportAction) {
    await this.authorize();
    await this.player.transport(action);
  }

  async setVolume(percent: number) {
    await this.authorize();
    await this.player.setVolume(percent);
  }
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runController", () => {
  test("fresh install authorizes, persists and enters the control loop", async () => {
    const store = new MemoryCredentialStore();
    const granted = makeCredential({ accessToken: "granted", expiresAt: NOW + 3_600_000 });
    const authenticate = vi.fn(async () => {
      await store.save(granted);
      return granted;
    });
    const keys = new FakeKeySource([{ char: "q" }]);

    await runController({
      config,
      store,
      authenticate,
      refresh: () => Promise.reject(new Error("unexpected refresh")),
      keys,
      hook: new FakeMediaKeyHook(),
      createApi: (tokens) => new TokenCheckingPlayer(tokens),
      now: () => NOW,
    });

    expect(authenticate).toHaveBeenCalledTimes(1);
    expect(store.current).toEqual(granted);
    expect(keys.started).toBe(true);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining("  [Space] - Play/Pause")
    );
  });

  test("an expired credential is refreshed once and the renewal persisted", async () => {
    const expired = makeCredential({ accessToken: "stale", expiresAt: 1_000 });
    const renewed = makeCredential({
      accessToken: "renewed",
      expiresAt: NOW + 3_600_000,
    });
    const store = new MemoryCredentialStore(expired);
    const refresh = vi.fn((_: Credential) => Promise.resolve(renewed));
    const authenticate = vi.fn(() => Promise.reject(new Error("unexpected login")));
    const apis: TokenCheckingPlayer[] = [];

    await runController({
      config,
      store,
      authenticate,
      refresh,
      keys: new FakeKeySource([{ char: "n" }, { char: "n" }, { char: "q" }]),
      hook: null,
      createApi: (tokens) => {
        const api = new TokenCheckingPlayer(tokens);
        apis.push(api);
        return api;
      },
      now: () => NOW,
    });

    expect(authenticate).not.toHaveBeenCalled();
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(refresh).toHaveBeenCalledWith(expired);
    expect(store.current).toEqual(renewed);
    expect(apis).toHaveLength(1);
    expect(apis[0]?.seenTokens).toEqual(["renewed", "renewed"]);
    expect(apis[0]?.player.calls).toEqual([
      { type: "transport", action: "next" },
      { type: "transport", action: "next" },
    ]);
  });

  test("a dispatch failure is reported and the loop continues", async () => {
    const store = new MemoryCredentialStore(
      makeCredential({ expiresAt: NOW + 3_600_000 })
    );
    const player = new FakePlayer(null);

    await runController({
      config,
      store,
      authenticate: () => Promise.reject(new Error("unexpected login")),
      refresh: () => Promise.reject(new Error("unexpected refresh")),
      keys: new FakeKeySource([{ char: " " }, { char: "m" }, { char: "q" }]),
      hook: null,
      createApi: () => player,
      now: () => NOW,
    });

    expect(console.error).toHaveBeenCalledWith(
      "Error executing Play/Pause: No active playback device."
    );
    expect(player.calls).toEqual([
      { type: "state" },
      { type: "volume", percent: 0 },
    ]);
  });

  test("rejects conflicting shortcuts before touching the credential", async () => {
    const store = new MemoryCredentialStore();
    const load = vi.spyOn(store, "load");

    await expect(
      runController({
        config: { ...config, shortcuts: { ...config.shortcuts, mute: "n" } },
        store,
        authenticate: () => Promise.reject(new Error("unexpected login")),
        refresh: () => Promise.reject(new Error("unexpected refresh")),
        keys: new FakeKeySource(),
        hook: null,
      })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(load).not.toHaveBeenCalled();
  });
});

describe("obtainCredential", () => {
  test("returns the stored credential without authorizing", async () => {
    const stored = makeCredential();
    const authenticate = vi.fn(() => Promise.resolve(makeCredential({ accessToken: "x" })));
    expect(
      await obtainCredential(new MemoryCredentialStore(stored), authenticate)
    ).toEqual(stored);
    expect(authenticate).not.toHaveBeenCalled();
  });

  test("falls back to authorization when the record is corrupt", async () => {
    const store = new MemoryCredentialStore();
    vi.spyOn(store, "load").mockRejectedValue(
      new CredentialCorruptError(store.filePath)
    );
    const granted = makeCredential({ accessToken: "granted" });

    expect(await obtainCredential(store, () => Promise.resolve(granted))).toEqual(
      granted
    );
  });

  test("propagates other load failures", async () => {
    const store = new MemoryCredentialStore();
    const failure = new Error("EACCES: permission denied");
    vi.spyOn(store, "load").mockRejectedValue(failure);
    const authenticate = vi.fn(() => Promise.resolve(makeCredential()));

    await expect(obtainCredential(store, authenticate)).rejects.toBe(failure);
    expect(authenticate).not.toHaveBeenCalled();
  });
});
