import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { PlayerAction, TokenStoreKind } from "../types.js";

export const DEFAULT_PORT = 9120;
export const DEFAULT_API_URL = "https://api.spotify.com/v1";
export const DEFAULT_ACCOUNTS_URL = "https://accounts.spotify.com";

export const SHORTCUT_ENV: Record<
  PlayerAction,
  { variable: string; fallback: string }
> = {
  togglePlayback: { variable: "SPOTKEY_KEY_PLAY_PAUSE", fallback: " " },
  next: { variable: "SPOTKEY_KEY_NEXT", fallback: "n" },
  previous: { variable: "SPOTKEY_KEY_PREV", fallback: "p" },
  volumeUp: { variable: "SPOTKEY_KEY_VOLUME_UP", fallback: "+" },
  volumeDown: { variable: "SPOTKEY_KEY_VOLUME_DOWN", fallback: "-" },
  mute: { variable: "SPOTKEY_KEY_MUTE", fallback: "m" },
};

export type ShortcutKeys = Record<PlayerAction, string>;

export type AppConfig = {
  clientId: string;
  clientSecret: string;
  port: number;
  certFile: string;
  keyFile: string;
  redirectUri: string;
  apiUrl: string;
  accountsUrl: string;
  tokenStore: TokenStoreKind | null;
  shortcuts: ShortcutKeys;
};

type Env = Record<string, string | undefined>;

const portSchema = z.coerce.number().int().min(1).max(65_535);
const tokenStoreSchema = z.enum(["plain", "encrypted"]);

function readEnv(env: Env, key: string) {
  const value = env[key];
  if (value === undefined || value === "") {
    return;
  }
  return value;
}

function parsePort(raw: string | undefined) {
  if (raw === undefined) {
    return DEFAULT_PORT;
  }
  const result = portSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `SPOTKEY_LOCAL_PORT must be a port number between 1 and 65535, got "${raw}".`
    );
  }
  return result.data;
}

export function parseTokenStoreKind(raw: string | undefined) {
  if (raw === undefined) {
    return null;
  }
  const result = tokenStoreSchema.safeParse(raw.toLowerCase());
  return result.success ? result.data : null;
}

export function resolveShortcutKeys(env: Env = process.env): ShortcutKeys {
  const key = (action: PlayerAction) => {
    const { variable, fallback } = SHORTCUT_ENV[action];
    const value = readEnv(env, variable) ?? fallback;
    // only the first character of an override is used
    return Array.from(value)[0] ?? fallback;
  };
  return {
    togglePlayback: key("togglePlayback"),
    next: key("next"),
    previous: key("previous"),
    volumeUp: key("volumeUp"),
    volumeDown: key("volumeDown"),
    mute: key("mute"),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const clientId = readEnv(env, "SPOTKEY_CLIENT_ID");
  const clientSecret = readEnv(env, "SPOTKEY_CLIENT_SECRET");
  if (!(clientId && clientSecret)) {
    throw new ConfigError(
      "SPOTKEY_CLIENT_ID and SPOTKEY_CLIENT_SECRET must be set."
    );
  }
  const rawStore = readEnv(env, "SPOTKEY_TOKEN_STORE");
  const tokenStore = parseTokenStoreKind(rawStore);
  if (rawStore !== undefined && !tokenStore) {
    throw new ConfigError(
      `SPOTKEY_TOKEN_STORE must be "plain" or "encrypted", got "${rawStore}".`
    );
  }
  const port = parsePort(readEnv(env, "SPOTKEY_LOCAL_PORT"));
  return {
    clientId,
    clientSecret,
    port,
    certFile: readEnv(env, "SPOTKEY_CERT_FILE") ?? "cert.pem",
    keyFile: readEnv(env, "SPOTKEY_KEY_FILE") ?? "key.pem",
    redirectUri: `https://127.0.0.1:${port}/callback`,
    apiUrl: readEnv(env, "SPOTKEY_API_URL") ?? DEFAULT_API_URL,
    accountsUrl: readEnv(env, "SPOTKEY_ACCOUNTS_URL") ?? DEFAULT_ACCOUNTS_URL,
    tokenStore,
    shortcuts: resolveShortcutKeys(env),
  };
}
