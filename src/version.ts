import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string().optional() });

function readPackageVersion() {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data.version : undefined;
}

export const PACKAGE_VERSION = readPackageVersion() ?? "0.0.0";
