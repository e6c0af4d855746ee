import type { AppConfig } from "./config/env.js";
import { ActionQueue } from "./control/action-queue.js";
import { buildShortcutTable, formatShortcutLegend } from "./control/bindings.js";
import type { MediaKeyHook } from "./control/media-keys.js";
import { runControlLoop } from "./control/multiplexer.js";
import type { KeySource } from "./control/terminal-keys.js";
import {
  CredentialCorruptError,
  CredentialNotFoundError,
} from "./errors.js";
import {
  AutoRefreshingTokenSource,
  type RefreshFn,
  type TokenSource,
} from "./oauth/token-source.js";
import { type PlayerApi, SpotifyPlayerApi } from "./player/api.js";
import { executeAction } from "./player/dispatcher.js";
import type { CredentialStore } from "./security/credential-store.js";
import type { Credential } from "./types.js";
import { info, warn } from "./utils/log.js";

export type ControllerDeps = {
  config: AppConfig;
  store: CredentialStore;
  authenticate: () => Promise<Credential>;
  refresh: RefreshFn;
  keys: KeySource;
  hook: MediaKeyHook | null;
  signal?: AbortSignal;
  createApi?: (tokens: TokenSource) => PlayerApi;
  now?: () => number;
};

export async function obtainCredential(
  store: CredentialStore,
  authenticate: () => Promise<Credential>
) {
  try {
    return await store.load();
  } catch (err) {
    if (err instanceof CredentialNotFoundError) {
      info("No stored credential found, starting authorization...");
    } else if (err instanceof CredentialCorruptError) {
      warn(`${err.message} Starting a new authorization.`);
    } else {
      throw err;
    }
  }
  return authenticate();
}

export async function runController(deps: ControllerDeps) {
  const shortcuts = buildShortcutTable(deps.config.shortcuts);
  const credential = await obtainCredential(deps.store, deps.authenticate);
  const tokens = new AutoRefreshingTokenSource({
    credential,
    refresh: deps.refresh,
    store: deps.store,
    now: deps.now,
  });
  const api = deps.createApi
    ? deps.createApi(tokens)
    : new SpotifyPlayerApi(tokens, deps.config.apiUrl);
  const queue = new ActionQueue((action) => executeAction(action, api));

  info("\nSpotify controller ready!");
  info(formatShortcutLegend(shortcuts));
  info("");

  await runControlLoop({
    keys: deps.keys,
    hook: deps.hook,
    shortcuts,
    queue,
    signal: deps.signal,
  });
}
