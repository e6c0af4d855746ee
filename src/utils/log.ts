const debugEnabled =
  process.env.SPOTKEY_DEBUG === "1" || process.env.SPOTKEY_DEBUG === "true";

export function info(message: string) {
  console.log(message);
}

export function warn(message: string) {
  console.error(message);
}

export function error(message: string) {
  console.error(message);
}

export function debug(message: string) {
  if (!debugEnabled) {
    return;
  }
  console.error(`[debug] ${message}`);
}
