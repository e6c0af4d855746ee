import { z } from "zod";
import { describeError, PlayerError } from "../errors.js";
import type { TokenSource } from "../oauth/token-source.js";
import type { PlaybackState, TransportAction } from "../types.js";

export type PlayerApi = {
  getPlaybackState(): Promise<PlaybackState>;
  transport(action: TransportAction): Promise<void>;
  setVolume(percent: number): Promise<void>;
};

const playbackStateSchema = z.object({
  is_playing: z.boolean(),
  device: z
    .object({
      volume_percent: z.number().nullable().optional(),
    })
    .nullable()
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({
    status: z.number().optional(),
    message: z.string().optional(),
    reason: z.string().optional(),
  }),
});

const TRANSPORT_ROUTES: Record<
  TransportAction,
  { method: "PUT" | "POST"; path: string }
> = {
  play: { method: "PUT", path: "/me/player/play" },
  pause: { method: "PUT", path: "/me/player/pause" },
  next: { method: "POST", path: "/me/player/next" },
  previous: { method: "POST", path: "/me/player/previous" },
};

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class SpotifyPlayerApi implements PlayerApi {
  private readonly baseUrl: string;
  private readonly tokens: TokenSource;

  constructor(tokens: TokenSource, baseUrl: string) {
    this.tokens = tokens;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private async request(method: string, path: string) {
    const credential = await this.tokens.token();
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `${credential.tokenType} ${credential.accessToken}`,
          Accept: "application/json",
        },
      });
    } catch (err) {
      throw new PlayerError(
        "transport",
        `Request to ${path} failed: ${describeError(err)}`,
        { cause: err }
      );
    }
    if (!res.ok) {
      await this.raiseForStatus(res, path);
    }
    return res;
  }

  private async raiseForStatus(res: Response, path: string): Promise<never> {
    const text = await res.text().catch(() => "");
    const body = errorBodySchema.safeParse(parseJson(text));
    const reason = body.success ? body.data.error.reason : undefined;
    const message = body.success ? body.data.error.message : undefined;
    if (res.status === 404 && reason === "NO_ACTIVE_DEVICE") {
      throw new PlayerError("no_active_device", "No active playback device.", {
        status: res.status,
      });
    }
    throw new PlayerError(
      "transport",
      `${path} returned ${res.status}${message ? `: ${message}` : ""}`,
      { status: res.status }
    );
  }

  async getPlaybackState(): Promise<PlaybackState> {
    const res = await this.request("GET", "/me/player");
    if (res.status === 204) {
      throw new PlayerError("no_active_device", "No active playback device.", {
        status: 204,
      });
    }
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new PlayerError(
        "decode",
        `Invalid playback state response: ${describeError(err)}`,
        { cause: err }
      );
    }
    const parsed = playbackStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new PlayerError(
        "decode",
        "Playback state response did not match the expected shape.",
        { cause: parsed.error }
      );
    }
    return {
      isPlaying: parsed.data.is_playing,
      volumePercent: parsed.data.device?.volume_percent ?? null,
    };
  }

  async transport(action: TransportAction) {
    const route = TRANSPORT_ROUTES[action];
    const res = await this.request(route.method, route.path);
    await res.body?.cancel();
  }

  async setVolume(percent: number) {
    const params = new URLSearchParams({
      volume_percent: String(Math.round(percent)),
    });
    const res = await this.request(
      "PUT",
      `/me/player/volume?${params.toString()}`
    );
    await res.body?.cancel();
  }
}
