import crypto from "node:crypto";
import open from "open";
import { AuthorizationError } from "../errors.js";
import type { CredentialStore } from "../security/credential-store.js";
import type { Credential } from "../types.js";
import { info, warn } from "../utils/log.js";
import { startCallbackServer, type TlsMaterial } from "./callback-server.js";
import {
  buildAuthorizationUrl,
  exchangeCode,
  type OAuthClientConfig,
} from "./spotify.js";

export const AUTHORIZATION_TIMEOUT_MS = 5 * 60 * 1000;

export type AuthenticateOptions = {
  client: OAuthClientConfig;
  store: CredentialStore;
  port: number;
  host?: string;
  tls: TlsMaterial | null;
  timeoutMs?: number;
  state?: string;
  onAuthorizationUrl?: (url: URL) => Promise<void>;
};

function formatDuration(ms: number) {
  return ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`;
}

async function presentAuthorizationUrl(url: URL) {
  info("Opening browser for authorization...");
  info("If the browser does not open, visit this URL:");
  info(url.toString());
  try {
    await open(url.toString());
  } catch (err) {
    warn(`Failed to open browser automatically: ${String(err)}`);
  }
}

export async function authenticate(
  options: AuthenticateOptions
): Promise<Credential> {
  const state = options.state ?? crypto.randomUUID();
  const server = await startCallbackServer(state, {
    port: options.port,
    host: options.host,
    tls: options.tls,
  });
  const client = { ...options.client, redirectUri: server.redirectUri };
  const timeoutMs = options.timeoutMs ?? AUTHORIZATION_TIMEOUT_MS;
  let timer: NodeJS.Timeout | undefined;
  let code: string;
  try {
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new AuthorizationError(
            "timeout",
            `Authorization timed out after ${formatDuration(timeoutMs)}. Run \`spotkey login\` to try again.`
          )
        );
      }, timeoutMs);
    });
    const outcome = Promise.race([server.codePromise, timeout]);
    // settles while the URL is presented; awaited below unless presenting fails
    outcome.catch(() => undefined);
    const present = options.onAuthorizationUrl ?? presentAuthorizationUrl;
    await present(buildAuthorizationUrl(client, state));
    code = await outcome;
  } finally {
    clearTimeout(timer);
    await server.close();
  }

  const credential = await exchangeCode(client, code);
  await options.store.save(credential);
  return credential;
}
