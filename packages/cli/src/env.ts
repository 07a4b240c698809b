import { readFile } from "node:fs/promises";
import path from "node:path";

export function readEnvText(raw: string): Record<string, string> {
  const envMap: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      continue;
    }

    const key = trimmed.slice(0, eq).replace(/^export\s+/, "").trim();
    const value = trimmed.slice(eq + 1).trim();
    const unquoted = value.replace(/^"(.*)"$/, "$1").replace(/^'(.*)'$/, "$1");
    envMap[key] = unquoted;
  }
  return envMap;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export async function loadDotEnv(cwd: string): Promise<Record<string, string>> {
  const envPath = path.join(cwd, ".env");
  try {
    const raw = await readFile(envPath, "utf-8");
    return readEnvText(raw);
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
}

/** Reads a token from the process environment first, then from `.env`. */
export async function loadToken(
  cwd: string,
  tokenKey: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | undefined> {
  const fromProcess = env[tokenKey]?.trim();
  if (fromProcess) {
    return fromProcess;
  }
  const envFile = await loadDotEnv(cwd);
  return envFile[tokenKey]?.trim() || undefined;
}
