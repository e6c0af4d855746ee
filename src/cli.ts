#!/usr/bin/env node
import "dotenv/config";
import { existsSync } from "node:fs";
import { confirm } from "@inquirer/prompts";
import { Command } from "commander";
import { runController } from "./app.js";
import {
  type AppConfig,
  loadConfig,
  parseTokenStoreKind,
  resolveShortcutKeys,
} from "./config/env.js";
import {
  credentialFilePath,
  encryptedCredentialFilePath,
} from "./config/paths.js";
import { loadSettings, setTokenStore } from "./config/store.js";
import { buildShortcutTable, formatShortcutLegend } from "./control/bindings.js";
import { UiohookMediaKeyHook } from "./control/media-keys.js";
import { TerminalKeySource } from "./control/terminal-keys.js";
import { ConfigError, describeError } from "./errors.js";
import { authenticate } from "./oauth/authorize.js";
import { loadTlsMaterial } from "./oauth/callback-server.js";
import { refreshCredential, type OAuthClientConfig } from "./oauth/spotify.js";
import {
  createCredentialStore,
  type CredentialStore,
  moveCredential,
} from "./security/credential-store.js";
import type { TokenStoreKind } from "./types.js";
import { error, info, warn } from "./utils/log.js";
import { PACKAGE_VERSION } from "./version.js";

function oauthClient(config: AppConfig): OAuthClientConfig {
  return {
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    redirectUri: config.redirectUri,
    accountsUrl: config.accountsUrl,
  };
}

function describeTokenStore(store: TokenStoreKind) {
  return store === "encrypted" ? "encrypted file" : "plaintext file";
}

async function resolveTokenStoreKind(
  config?: Pick<AppConfig, "tokenStore">
): Promise<TokenStoreKind> {
  const fromEnv =
    config?.tokenStore ?? parseTokenStoreKind(process.env.SPOTKEY_TOKEN_STORE);
  if (fromEnv) {
    return fromEnv;
  }
  const settings = await loadSettings();
  if (settings.tokenStore) {
    return settings.tokenStore;
  }
  const plainExists = existsSync(credentialFilePath());
  const encryptedExists = existsSync(encryptedCredentialFilePath());
  if (encryptedExists && !plainExists) {
    return "encrypted";
  }
  return "plain";
}

function authenticator(config: AppConfig, store: CredentialStore) {
  return async () => {
    const tls = await loadTlsMaterial(config.certFile, config.keyFile);
    return authenticate({
      client: oauthClient(config),
      store,
      port: config.port,
      tls,
    });
  };
}

async function handleRun() {
  const config = loadConfig();
  const store = createCredentialStore(await resolveTokenStoreKind(config));
  const client = oauthClient(config);
  const controller = new AbortController();
  const onTerminate = () => controller.abort();
  process.once("SIGTERM", onTerminate);
  try {
    await runController({
      config,
      store,
      authenticate: authenticator(config, store),
      refresh: (credential) => refreshCredential(client, credential),
      keys: new TerminalKeySource(),
      hook: new UiohookMediaKeyHook(),
      signal: controller.signal,
    });
  } finally {
    process.off("SIGTERM", onTerminate);
  }
}

async function handleLogin() {
  const config = loadConfig();
  const store = createCredentialStore(await resolveTokenStoreKind(config));
  info(`Register this redirect URI with your Spotify app: ${config.redirectUri}`);
  await authenticator(config, store)();
  info(`Credential saved to ${store.filePath}.`);
}

async function handleLogout() {
  const store = createCredentialStore(await resolveTokenStoreKind());
  if (!existsSync(store.filePath)) {
    info("No stored credential.");
    return;
  }
  const confirmed = await confirm({
    message: `Delete the stored Spotify credential at ${store.filePath}?`,
    default: false,
  });
  if (!confirmed) {
    info("Logout cancelled.");
    return;
  }
  await store.remove();
  info("Stored credential deleted.");
}

function handleShortcuts() {
  const table = buildShortcutTable(resolveShortcutKeys());
  info(formatShortcutLegend(table));
}

async function migrateCredential(from: TokenStoreKind, to: TokenStoreKind) {
  const fromStore = createCredentialStore(from);
  if (!existsSync(fromStore.filePath)) {
    return false;
  }
  if (!process.stdin.isTTY) {
    warn(
      "A credential exists but no TTY is available to confirm migration. It stays in the previous store."
    );
    return false;
  }
  const shouldMigrate = await confirm({
    message: `Move the stored credential from the ${describeTokenStore(from)} to the ${describeTokenStore(to)}?`,
    default: true,
  });
  if (!shouldMigrate) {
    return false;
  }
  if (!(await moveCredential(fromStore, createCredentialStore(to)))) {
    warn("The stored credential could not be read and was not migrated.");
    return false;
  }
  info(`Migrated credential to the ${describeTokenStore(to)}.`);
  return true;
}

async function handleTokenStore(storeValue?: string) {
  const current = await resolveTokenStoreKind();
  if (!storeValue) {
    info(`Current token store: ${current}.`);
    info("Available token stores: plain, encrypted.");
    info("Set with: spotkey token-store <store>");
    return;
  }
  const next = parseTokenStoreKind(storeValue);
  if (!next) {
    throw new ConfigError("Invalid token store. Use one of: plain, encrypted.");
  }
  if (next === current) {
    info(`Token store already set to ${next}.`);
    return;
  }
  const migrated = await migrateCredential(current, next);
  await setTokenStore(next);
  info(`Default token store set to ${next}.`);
  if (!migrated) {
    warn("Run `spotkey login` if no credential exists in the new store.");
  }
}

async function main() {
  const program = new Command();
  program
    .name("spotkey")
    .description("Control Spotify playback from keyboard shortcuts and media keys")
    .version(PACKAGE_VERSION)
    .action(handleRun);

  program
    .command("run")
    .description("Start the playback controller (default)")
    .action(handleRun);

  program
    .command("login")
    .description("Authorize with Spotify and store the credential")
    .action(handleLogin);

  program
    .command("logout")
    .description("Delete the stored credential")
    .action(handleLogout);

  program
    .command("shortcuts")
    .description("Print the configured keyboard shortcuts")
    .action(handleShortcuts);

  program
    .command("token-store")
    .argument("[store]", "Credential storage backend (plain|encrypted)")
    .description("Show or set the credential storage backend")
    .action(async (store?: string) => {
      await handleTokenStore(store);
    });

  await program.parseAsync(process.argv);
}

main().then(
  () => {
    // pooled fetch connections would otherwise hold the process open after quit
    process.exit(process.exitCode ?? 0);
  },
  (err: unknown) => {
    error(describeError(err));
    process.exit(1);
  }
);
