import { promises as fs } from "node:fs";
import path from "node:path";

let tempCounter = 0;

export async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
}

export async function atomicWrite(
  filePath: string,
  contents: string,
  options?: { mode?: number }
) {
  const dir = path.dirname(filePath);
  tempCounter += 1;
  const tempPath = path.join(
    dir,
    `.tmp-${Date.now()}-${process.pid}-${tempCounter}`
  );
  const mode = options?.mode ?? 0o644;
  await fs.writeFile(tempPath, contents, { encoding: "utf8", mode });
  // writeFile only applies the mode on create and the umask may narrow it
  await fs.chmod(tempPath, mode);
  await fs.rename(tempPath, filePath);
}

export async function removeFile(filePath: string) {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      throw err;
    }
  }
}
