import type { CredentialStore } from "../security/credential-store.js";
import type { Credential } from "../types.js";
import { debug } from "../utils/log.js";

export const EXPIRY_LEEWAY_MS = 10_000;

export type TokenSource = {
  token(): Promise<Credential>;
};

export type RefreshFn = (credential: Credential) => Promise<Credential>;

export function isExpired(
  credential: Credential,
  now: number,
  leewayMs: number = EXPIRY_LEEWAY_MS
) {
  return credential.expiresAt <= now + leewayMs;
}

/**
 * Hands out the current credential, exchanging it through `refresh` once it
 * expires. Every successful call persists the credential it returns so the
 * stored copy always matches what callers have seen.
 */
export class AutoRefreshingTokenSource implements TokenSource {
  private credential: Credential;
  private readonly refresh: RefreshFn;
  private readonly store: CredentialStore;
  private readonly now: () => number;
  private refreshPromise: Promise<Credential> | null = null;

  constructor(options: {
    credential: Credential;
    refresh: RefreshFn;
    store: CredentialStore;
    now?: () => number;
  }) {
    this.credential = options.credential;
    this.refresh = options.refresh;
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  current() {
    return this.credential;
  }

  private refreshShared() {
    if (!this.refreshPromise) {
      const previous = this.credential;
      this.refreshPromise = this.refresh(previous)
        .then((refreshed) => {
          this.credential = refreshed;
          return refreshed;
        })
        .finally(() => {
          this.refreshPromise = null;
        });
    }
    return this.refreshPromise;
  }

  async token() {
    let credential = this.credential;
    if (isExpired(credential, this.now())) {
      debug("Access token expired, refreshing.");
      credential = await this.refreshShared();
    }
    await this.store.save(credential);
    return credential;
  }
}
