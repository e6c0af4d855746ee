export type Credential = {
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
  tokenType: string;
};

export type TokenStoreKind = "plain" | "encrypted";

export type SettingsFile = {
  tokenStore?: TokenStoreKind;
};

export const PLAYER_ACTIONS = [
  "togglePlayback",
  "next",
  "previous",
  "volumeUp",
  "volumeDown",
  "mute",
] as const;

export type PlayerAction = (typeof PLAYER_ACTIONS)[number];

export type PlaybackState = {
  isPlaying: boolean;
  volumePercent: number | null;
};

export type TransportAction = "play" | "pause" | "next" | "previous";
