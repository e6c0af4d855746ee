import crypto from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { password as promptPassword } from "@inquirer/prompts";
import PQueue from "p-queue";
import { z } from "zod";
import {
  credentialFilePath,
  encryptedCredentialFilePath,
} from "../config/paths.js";
import {
  CredentialCorruptError,
  CredentialNotFoundError,
  SpotkeyError,
} from "../errors.js";
import type { Credential, TokenStoreKind } from "../types.js";
import { atomicWrite, ensureDir, removeFile } from "../utils/fs.js";

export type CredentialStore = {
  readonly filePath: string;
  load(): Promise<Credential>;
  save(credential: Credential): Promise<void>;
  remove(): Promise<void>;
};

const TOKEN_ENV = "SPOTKEY_TOKEN_PASSWORD";
const FILE_MODE = 0o600;

const credentialSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string(),
  expiresAt: z.number().finite(),
  tokenType: z.string().min(1),
});

const encryptedPayloadSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  ciphertext: z.string(),
});

let cachedPassword: string | null = null;

async function getMasterPassword(intent: "read" | "write") {
  if (cachedPassword !== null) {
    return cachedPassword;
  }
  const fromEnv = process.env[TOKEN_ENV];
  if (fromEnv !== undefined) {
    cachedPassword = fromEnv;
    return cachedPassword;
  }
  if (!process.stdin.isTTY) {
    throw new SpotkeyError(
      "password_required",
      `Encrypted credential store requires a password. Set ${TOKEN_ENV} to run non-interactively.`
    );
  }
  cachedPassword = await promptPassword({
    message:
      intent === "read"
        ? "Enter master password to unlock the Spotify credential"
        : "Create a master password to encrypt the Spotify credential",
    mask: "*",
  });
  return cachedPassword;
}

async function readRecord(filePath: string) {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new CredentialNotFoundError(filePath);
    }
    throw err;
  }
}

function parseCredential(filePath: string, raw: string): Credential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CredentialCorruptError(filePath, err);
  }
  const result = credentialSchema.safeParse(parsed);
  if (!result.success) {
    throw new CredentialCorruptError(filePath, result.error);
  }
  return result.data;
}

function serializeCredential(credential: Credential) {
  const { accessToken, refreshToken, expiresAt, tokenType } = credential;
  return JSON.stringify({ accessToken, refreshToken, expiresAt, tokenType });
}

function encrypt(password: string, plaintext: string) {
  const salt = crypto.randomBytes(16);
  const iv = crypto.randomBytes(12);
  const key = crypto.scryptSync(password, salt, 32);
  const cipher = crypto.createCipheriv("aes-256-gcm", key, iv);
  const ciphertext = Buffer.concat([
    cipher.update(plaintext, "utf8"),
    cipher.final(),
  ]);
  return {
    version: 1,
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
    ciphertext: ciphertext.toString("base64"),
  };
}

function decrypt(filePath: string, password: string, raw: string) {
  try {
    const payload = encryptedPayloadSchema.parse(JSON.parse(raw));
    const key = crypto.scryptSync(
      password,
      Buffer.from(payload.salt, "base64"),
      32
    );
    const decipher = crypto.createDecipheriv(
      "aes-256-gcm",
      key,
      Buffer.from(payload.iv, "base64")
    );
    decipher.setAuthTag(Buffer.from(payload.tag, "base64"));
    return Buffer.concat([
      decipher.update(Buffer.from(payload.ciphertext, "base64")),
      decipher.final(),
    ]).toString("utf8");
  } catch (err) {
    throw new CredentialCorruptError(filePath, err);
  }
}

export class PlaintextCredentialStore implements CredentialStore {
  readonly filePath: string;
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(filePath: string = credentialFilePath()) {
    this.filePath = filePath;
  }

  async load() {
    const raw = await readRecord(this.filePath);
    return parseCredential(this.filePath, raw);
  }

  async save(credential: Credential) {
    await this.queue.add(async () => {
      await ensureDir(path.dirname(this.filePath));
      await atomicWrite(this.filePath, serializeCredential(credential), {
        mode: FILE_MODE,
      });
    });
  }

  async remove() {
    await this.queue.add(() => removeFile(this.filePath));
  }
}

export class EncryptedCredentialStore implements CredentialStore {
  readonly filePath: string;
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly resolvePassword: (
    intent: "read" | "write"
  ) => Promise<string>;

  constructor(options?: {
    filePath?: string;
    password?: (intent: "read" | "write") => Promise<string>;
  }) {
    this.filePath = options?.filePath ?? encryptedCredentialFilePath();
    this.resolvePassword = options?.password ?? getMasterPassword;
  }

  async load() {
    const raw = await readRecord(this.filePath);
    const password = await this.resolvePassword("read");
    return parseCredential(this.filePath, decrypt(this.filePath, password, raw));
  }

  async save(credential: Credential) {
    await this.queue.add(async () => {
      const password = await this.resolvePassword("write");
      const payload = encrypt(password, serializeCredential(credential));
      await ensureDir(path.dirname(this.filePath));
      await atomicWrite(this.filePath, JSON.stringify(payload, null, 2), {
        mode: FILE_MODE,
      });
    });
  }

  async remove() {
    await this.queue.add(() => removeFile(this.filePath));
  }
}

export function createCredentialStore(kind: TokenStoreKind): CredentialStore {
  if (kind === "encrypted") {
    return new EncryptedCredentialStore();
  }
  return new PlaintextCredentialStore();
}

/**
 * Copies the credential from one store into another, then deletes the
 * source. Returns false and leaves both untouched when the source cannot be
 * read or both stores share a file.
 */
export async function moveCredential(
  from: CredentialStore,
  to: CredentialStore
) {
  if (path.resolve(from.filePath) === path.resolve(to.filePath)) {
    return false;
  }
  const credential = await loadStoredCredential(from);
  if (!credential) {
    return false;
  }
  await to.save(credential);
  await from.remove();
  return true;
}

export async function loadStoredCredential(store: CredentialStore) {
  try {
    return await store.load();
  } catch (err) {
    if (
      err instanceof CredentialNotFoundError ||
      err instanceof CredentialCorruptError
    ) {
      return null;
    }
    throw err;
  }
}
