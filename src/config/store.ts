import { promises as fs } from "node:fs";
import { z } from "zod";
import type { SettingsFile, TokenStoreKind } from "../types.js";
import { atomicWrite, ensureDir } from "../utils/fs.js";
import { warn } from "../utils/log.js";
import { configDir, settingsFilePath } from "./paths.js";

const settingsSchema = z.object({
  tokenStore: z.enum(["plain", "encrypted"]).optional(),
});

export async function loadSettings(): Promise<SettingsFile> {
  const filePath = settingsFilePath();
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    warn(`Ignoring malformed settings file at ${filePath}.`);
    return {};
  }
  const result = settingsSchema.safeParse(parsed);
  if (!result.success) {
    warn(`Ignoring invalid settings file at ${filePath}.`);
    return {};
  }
  return result.data;
}

export async function saveSettings(settings: SettingsFile) {
  await ensureDir(configDir());
  await atomicWrite(settingsFilePath(), JSON.stringify(settings, null, 2), {
    mode: 0o600,
  });
}

export async function setTokenStore(tokenStore: TokenStoreKind) {
  const settings = await loadSettings();
  settings.tokenStore = tokenStore;
  await saveSettings(settings);
}
