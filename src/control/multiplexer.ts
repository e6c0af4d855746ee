import { describeError } from "../errors.js";
import { debug, info, warn } from "../utils/log.js";
import type { ActionQueue } from "./action-queue.js";
import {
  MEDIA_KEY_BINDINGS,
  type MediaKeyBinding,
  QUIT_KEY,
  type ShortcutTable,
} from "./bindings.js";
import type { HookEvent, MediaKeyHook } from "./media-keys.js";
import type { KeyPress, KeySource } from "./terminal-keys.js";

export type ControlLoopOptions = {
  keys: KeySource;
  hook: MediaKeyHook | null;
  shortcuts: ShortcutTable;
  queue: ActionQueue;
  mediaKeys?: readonly MediaKeyBinding[];
  signal?: AbortSignal;
};

export function isQuitKey(key: KeyPress) {
  if (key.char === QUIT_KEY) {
    return true;
  }
  if (key.name === "escape") {
    return true;
  }
  return Boolean(key.ctrl) && key.name === "c";
}

async function startHook(
  hook: MediaKeyHook,
  listener: (event: HookEvent) => void
) {
  try {
    const started = await hook.start(listener);
    if (!started) {
      warn("Media keys are unavailable on this system; keyboard shortcuts still work.");
    }
    return started;
  } catch (err) {
    warn(`Failed to start media key listener: ${describeError(err)}`);
    return false;
  }
}

/**
 * Feeds the terminal and media-key producers into one action queue until
 * the user quits or `signal` aborts. Both producers share one cancellation
 * signal; pending actions finish before this resolves.
 */
export async function runControlLoop(options: ControlLoopOptions) {
  const controller = new AbortController();
  const { signal } = controller;
  const cancel = () => controller.abort();
  if (options.signal?.aborted) {
    return;
  }
  options.signal?.addEventListener("abort", cancel, { once: true });
  const stopped = new Promise<void>((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

  const mediaKeys = new Map(
    (options.mediaKeys ?? MEDIA_KEY_BINDINGS).map((binding) => [
      binding.keycode,
      binding,
    ])
  );

  const onKey = (key: KeyPress) => {
    if (signal.aborted) {
      return;
    }
    if (isQuitKey(key)) {
      info("\nExiting...");
      controller.abort();
      return;
    }
    const binding =
      key.char === undefined ? undefined : options.shortcuts.get(key.char);
    if (!binding) {
      return;
    }
    options.queue.enqueue(binding.action, "keyboard");
  };

  const onHookEvent = (event: HookEvent) => {
    if (signal.aborted || event.kind !== "keydown") {
      return;
    }
    const binding = mediaKeys.get(event.keycode);
    if (!binding) {
      return;
    }
    options.queue.enqueue(binding.action, "media-key");
  };

  const hookRunning = options.hook
    ? startHook(options.hook, onHookEvent)
    : Promise.resolve(false);

  try {
    options.keys.start(onKey);
    await stopped;
  } finally {
    controller.abort();
    options.signal?.removeEventListener("abort", cancel);
    options.keys.stop();
    if ((await hookRunning) && options.hook) {
      await options.hook.stop();
    }
    options.queue.close();
    await options.queue.drain();
    debug("Control loop stopped.");
  }
}
