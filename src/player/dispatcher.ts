import { PlayerError } from "../errors.js";
import type { PlayerAction } from "../types.js";
import type { PlayerApi } from "./api.js";

export const VOLUME_STEP = 10;

export const ACTION_NAMES: Record<PlayerAction, string> = {
  togglePlayback: "Play/Pause",
  next: "Next Track",
  previous: "Previous Track",
  volumeUp: "Volume Up",
  volumeDown: "Volume Down",
  mute: "Mute",
};

export function clampVolume(value: number) {
  return Math.min(100, Math.max(0, value));
}

async function adjustVolume(api: PlayerApi, delta: number) {
  const state = await api.getPlaybackState();
  if (state.volumePercent === null) {
    throw new PlayerError(
      "decode",
      "The active device does not report a volume level."
    );
  }
  const volume = clampVolume(state.volumePercent + delta);
  await api.setVolume(volume);
  return volume;
}

/**
 * Runs one player action. Toggle and volume steps read the current state
 * first; the write that follows is not atomic with that read.
 */
export async function executeAction(action: PlayerAction, api: PlayerApi) {
  switch (action) {
    case "togglePlayback": {
      const state = await api.getPlaybackState();
      await api.transport(state.isPlaying ? "pause" : "play");
      return;
    }
    case "next":
      await api.transport("next");
      return;
    case "previous":
      await api.transport("previous");
      return;
    case "volumeUp":
      await adjustVolume(api, VOLUME_STEP);
      return;
    case "volumeDown":
      await adjustVolume(api, -VOLUME_STEP);
      return;
    case "mute":
      await api.setVolume(0);
      return;
    default: {
      const unknown: never = action;
      throw new Error(`Unknown player action: ${String(unknown)}`);
    }
  }
}
