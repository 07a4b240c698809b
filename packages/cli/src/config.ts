import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";
import { isValidTimeZone, parseRepoRef, type LabelRules, type RepoRef } from "@maintainer-pulse/core";

export const CONFIG_FILE_NAME = ".maintainer-pulse.yml";

const repoPattern = /^[^/\s]+\/[^/\s]+$/;
const loginListSchema = z.array(z.string().trim().min(1)).default([]);

const windowSchema = z
  .object({
    defaultDays: z.number().int().min(1).default(7),
    maxDays: z.number().int().min(1).default(180),
    maxSpanDays: z.number().int().min(1).default(200)
  })
  .default({})
  .refine((value) => value.defaultDays <= value.maxDays, {
    message: "defaultDays must not exceed maxDays",
    path: ["defaultDays"]
  });

export const pulseConfigSchema = z.object({
  timezone: z
    .string()
    .min(1)
    .default("UTC")
    .refine(isValidTimeZone, "Timezone must be UTC or an IANA name such as America/Los_Angeles"),
  repository: z.string().regex(repoPattern, "Repo format must be owner/name").optional(),
  github: z
    .object({
      tokenEnv: z.string().min(1).default("GITHUB_TOKEN"),
      pageSize: z.number().int().min(1).max(100).default(100),
      baseUrl: z.string().url().optional()
    })
    .default({}),
  window: windowSchema,
  team: z
    .object({
      members: loginListSchema,
      contributors: loginListSchema
    })
    .default({}),
  labels: z
    .object({
      resolutionPrefixes: z.array(z.string().min(1)).default(["Resolution-", "WG-"]),
      acknowledgmentPrefixes: z.array(z.string().min(1)).default(["WG-"])
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).default("0.0.0.0"),
      port: z.number().int().min(0).max(65535).default(5001)
    })
    .default({})
});

export type PulseConfig = z.infer<typeof pulseConfigSchema>;

export function createDefaultConfig(): PulseConfig {
  return pulseConfigSchema.parse({});
}

export function parseConfigString(raw: string): PulseConfig {
  const doc: unknown = parse(raw) ?? {};
  return pulseConfigSchema.parse(doc);
}

export async function loadConfig(cwd: string, fileName = CONFIG_FILE_NAME): Promise<PulseConfig> {
  const configPath = path.join(cwd, fileName);
  const raw = await readFile(configPath, "utf-8");
  return parseConfigString(raw);
}

export function serializeConfig(config: PulseConfig): string {
  return stringify(config, {
    lineWidth: 0,
    defaultStringType: "PLAIN"
  });
}

/** The configured default repository, or undefined when none is set. */
export function configuredRepo(config: PulseConfig): RepoRef | undefined {
  return config.repository ? parseRepoRef(config.repository) : undefined;
}

export function labelRulesOf(config: PulseConfig): LabelRules {
  return {
    resolutionPrefixes: config.labels.resolutionPrefixes,
    acknowledgmentPrefixes: config.labels.acknowledgmentPrefixes
  };
}

export function formatConfigError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${where}: ${issue.message}`;
      })
      .join("\n");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
