import { z } from "zod";
import { AuthorizationError, describeError, RefreshError } from "../errors.js";
import type { Credential } from "../types.js";
import { debug } from "../utils/log.js";

export const DEFAULT_SCOPES = [
  "user-modify-playback-state",
  "user-read-playback-state",
];

// Spotify always reports expires_in; an hour is its documented lifetime
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export type OAuthClientConfig = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  accountsUrl: string;
  scopes?: string[];
};

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

class TokenEndpointError extends Error {
  readonly oauthError?: string;

  constructor(message: string, oauthError?: string) {
    super(message);
    this.name = "TokenEndpointError";
    this.oauthError = oauthError;
  }
}

export function buildAuthorizationUrl(client: OAuthClientConfig, state: string) {
  const url = new URL("/authorize", client.accountsUrl);
  url.searchParams.set("client_id", client.clientId);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("redirect_uri", client.redirectUri);
  url.searchParams.set("scope", (client.scopes ?? DEFAULT_SCOPES).join(" "));
  url.searchParams.set("state", state);
  return url;
}

function parseJsonPayload(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

async function readErrorBody(res: Response) {
  const text = await res.text().catch(() => "");
  const parsed = errorResponseSchema.safeParse(parseJsonPayload(text));
  if (parsed.success) {
    return parsed.data;
  }
  return { error: text.trim() || res.statusText, error_description: undefined };
}

async function requestToken(
  client: OAuthClientConfig,
  params: Record<string, string>
): Promise<TokenResponse> {
  const basic = Buffer.from(
    `${client.clientId}:${client.clientSecret}`
  ).toString("base64");
  const res = await fetch(new URL("/api/token", client.accountsUrl), {
    method: "POST",
    headers: {
      Authorization: `Basic ${basic}`,
      "Content-Type": "application/x-www-form-urlencoded",
      Accept: "application/json",
    },
    body: new URLSearchParams(params).toString(),
  });
  if (!res.ok) {
    const body = await readErrorBody(res);
    const detail = body.error_description
      ? `${body.error}: ${body.error_description}`
      : body.error;
    throw new TokenEndpointError(
      `Token request failed (${res.status}): ${detail}`,
      body.error
    );
  }
  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    throw new TokenEndpointError(
      `Token endpoint returned invalid JSON: ${describeError(err)}`
    );
  }
  const parsed = tokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new TokenEndpointError(
      "Token endpoint response is missing required fields."
    );
  }
  return parsed.data;
}

export function toCredential(
  tokens: TokenResponse,
  options?: { previous?: Credential; now?: number }
): Credential {
  const now = options?.now ?? Date.now();
  const expiresIn = tokens.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
  return {
    accessToken: tokens.access_token,
    refreshToken:
      tokens.refresh_token ?? options?.previous?.refreshToken ?? "",
    expiresAt: now + expiresIn * 1000,
    tokenType: tokens.token_type,
  };
}

export async function exchangeCode(
  client: OAuthClientConfig,
  code: string
): Promise<Credential> {
  try {
    const tokens = await requestToken(client, {
      grant_type: "authorization_code",
      code,
      redirect_uri: client.redirectUri,
    });
    debug("Exchanged authorization code for a credential.");
    return toCredential(tokens);
  } catch (err) {
    throw new AuthorizationError("exchange_failed", describeError(err), {
      cause: err,
    });
  }
}

export async function refreshCredential(
  client: OAuthClientConfig,
  credential: Credential
): Promise<Credential> {
  if (!credential.refreshToken) {
    throw new RefreshError(
      "No refresh token available. Run `spotkey login` to re-authenticate."
    );
  }
  try {
    const tokens = await requestToken(client, {
      grant_type: "refresh_token",
      refresh_token: credential.refreshToken,
    });
    debug("Refreshed the access token.");
    return toCredential(tokens, { previous: credential });
  } catch (err) {
    const invalidGrant =
      err instanceof TokenEndpointError && err.oauthError === "invalid_grant";
    throw new RefreshError(describeError(err), { cause: err, invalidGrant });
  }
}
