import { debug } from "../utils/log.js";

export type HookEvent = {
  kind: "keydown" | "keyup";
  keycode: number;
};

export type MediaKeyHook = {
  /** Resolves false when no global hook is available on this system. */
  start(listener: (event: HookEvent) => void): Promise<boolean>;
  stop(): Promise<void>;
};

export type HookBackend = {
  on(
    event: "keydown" | "keyup",
    listener: (event: { keycode: number }) => void
  ): unknown;
  removeAllListeners(event?: string): unknown;
  start(): void;
  stop(): void;
};

async function loadUiohook(): Promise<HookBackend | null> {
  try {
    const { uIOhook } = await import("uiohook-napi");
    return {
      on: (event, listener) =>
        event === "keydown"
          ? uIOhook.on("keydown", listener)
          : uIOhook.on("keyup", listener),
      removeAllListeners: (event) => uIOhook.removeAllListeners(event),
      start: () => uIOhook.start(),
      stop: () => uIOhook.stop(),
    };
  } catch (err) {
    debug(`uiohook-napi could not be loaded: ${String(err)}`);
    return null;
  }
}

export class UiohookMediaKeyHook implements MediaKeyHook {
  private readonly load: () => Promise<HookBackend | null>;
  private backend: HookBackend | null = null;

  constructor(load: () => Promise<HookBackend | null> = loadUiohook) {
    this.load = load;
  }

  async start(listener: (event: HookEvent) => void) {
    const backend = await this.load();
    if (!backend) {
      return false;
    }
    backend.on("keydown", (event) => {
      listener({ kind: "keydown", keycode: event.keycode });
    });
    backend.on("keyup", (event) => {
      listener({ kind: "keyup", keycode: event.keycode });
    });
    backend.start();
    this.backend = backend;
    return true;
  }

  async stop() {
    const backend = this.backend;
    if (!backend) {
      return;
    }
    this.backend = null;
    backend.stop();
    backend.removeAllListeners("keydown");
    backend.removeAllListeners("keyup");
  }
}
