export class SpotkeyError<Code extends string = string> extends Error {
  readonly code: Code;

  constructor(code: Code, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends SpotkeyError<"invalid_config"> {
  constructor(message: string) {
    super("invalid_config", message);
  }
}

export type AuthorizationErrorCode =
  | "state_mismatch"
  | "missing_code"
  | "timeout"
  | "exchange_failed";

export class AuthorizationError extends SpotkeyError<AuthorizationErrorCode> {}

export class RefreshError extends SpotkeyError<"refresh_failed"> {
  readonly invalidGrant: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; invalidGrant?: boolean }
  ) {
    super("refresh_failed", message, options);
    this.invalidGrant = options?.invalidGrant ?? false;
  }
}

export class CredentialNotFoundError extends SpotkeyError<"credential_not_found"> {
  constructor(filePath: string) {
    super("credential_not_found", `No stored credential at ${filePath}.`);
  }
}

export class CredentialCorruptError extends SpotkeyError<"credential_corrupt"> {
  constructor(filePath: string, cause?: unknown) {
    super(
      "credential_corrupt",
      `Stored credential at ${filePath} could not be read.`,
      { cause }
    );
  }
}

export type PlayerErrorCode = "no_active_device" | "transport" | "decode";

export class PlayerError extends SpotkeyError<PlayerErrorCode> {
  readonly status?: number;

  constructor(
    code: PlayerErrorCode,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(code, message, options);
    this.status = options?.status;
  }
}

export function isInvalidGrantError(err: unknown) {
  if (err instanceof RefreshError) {
    return err.invalidGrant;
  }
  if (!err || typeof err !== "object") {
    return false;
  }
  const message = String(err).toLowerCase();
  return message.includes("invalid_grant");
}

export function describeError(err: unknown) {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
