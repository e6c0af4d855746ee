import os from "node:os";
import path from "node:path";

export function configDir() {
  return path.join(os.homedir(), ".spotkey");
}

export function settingsFilePath() {
  return path.join(configDir(), "config.json");
}

export function credentialFilePath() {
  return (
    process.env.SPOTKEY_CREDENTIAL_FILE ??
    path.join(configDir(), "credential.json")
  );
}

export function encryptedCredentialFilePath() {
  const override = process.env.SPOTKEY_CREDENTIAL_FILE;
  if (override) {
    return override.replace(/(\.json)?$/, ".enc.json");
  }
  return path.join(configDir(), "credential.enc.json");
}
