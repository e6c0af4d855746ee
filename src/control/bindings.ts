import type { ShortcutKeys } from "../config/env.js";
import { ConfigError } from "../errors.js";
import { ACTION_NAMES } from "../player/dispatcher.js";
import { PLAYER_ACTIONS, type PlayerAction } from "../types.js";

export const QUIT_KEY = "q";

export type ShortcutBinding = {
  trigger: string;
  displayName: string;
  action: PlayerAction;
};

export type MediaKeyBinding = {
  keycode: number;
  displayName: string;
  action: PlayerAction;
};

export type ShortcutTable = ReadonlyMap<string, ShortcutBinding>;

// libuiohook virtual key codes for the media keys
export const MEDIA_KEY_BINDINGS: readonly MediaKeyBinding[] = [
  { keycode: 0xe022, displayName: "Play/Pause", action: "togglePlayback" },
  { keycode: 0xe019, displayName: "Next Track", action: "next" },
  { keycode: 0xe010, displayName: "Previous Track", action: "previous" },
];

export function buildShortcutTable(keys: ShortcutKeys): ShortcutTable {
  const table = new Map<string, ShortcutBinding>();
  for (const action of PLAYER_ACTIONS) {
    const trigger = keys[action];
    if (trigger === QUIT_KEY) {
      throw new ConfigError(
        `Shortcut "${trigger}" for ${ACTION_NAMES[action]} is reserved for quit.`
      );
    }
    const existing = table.get(trigger);
    if (existing) {
      throw new ConfigError(
        `Shortcut "${describeKey(trigger)}" is bound to both ${existing.displayName} and ${ACTION_NAMES[action]}.`
      );
    }
    table.set(trigger, {
      trigger,
      displayName: ACTION_NAMES[action],
      action,
    });
  }
  return table;
}

export function describeKey(trigger: string) {
  if (trigger === " ") {
    return "Space";
  }
  return trigger;
}

export function formatShortcutLegend(table: ShortcutTable) {
  const lines = ["Available shortcuts:"];
  for (const binding of table.values()) {
    lines.push(`  [${describeKey(binding.trigger)}] - ${binding.displayName}`);
  }
  lines.push(`  [${QUIT_KEY}] - Quit`);
  const mediaNames = MEDIA_KEY_BINDINGS.map((binding) => binding.displayName);
  lines.push(`  Media keys (${mediaNames.join(", ")}) are also supported`);
  return lines.join("\n");
}
