import { once } from "node:events";
import { access, writeFile } from "node:fs/promises";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import path from "node:path";
import { parseRepoRef, repoFullName, type RepoRef } from "@maintainer-pulse/core";
import { formatMetricsResponse, formatTeamEngagementResponse } from "@maintainer-pulse/renderer-json";
import { renderContributionsReport, renderEngagementReport } from "@maintainer-pulse/renderer-markdown";
import {
  CONFIG_FILE_NAME,
  configuredRepo,
  createDefaultConfig,
  formatConfigError,
  loadConfig,
  pulseConfigSchema,
  serializeConfig,
  type PulseConfig
} from "./config.js";
import { loadToken } from "./env.js";
import { createProviderLogger, defaultIO, type CliIO } from "./io.js";
import { ReportService, resolveRequestWindow, type TransportFactory } from "./reports.js";
import { createApiHandler, createApiServer, listen } from "./server.js";
import { writeReportFiles, type ReportFormat } from "./writer.js";

export type { CliIO } from "./io.js";

type CliCommand = "metrics" | "team" | "serve" | "validate" | "init" | "help";

export interface CliRuntimeOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  createTransport?: TransportFactory;
  onListening?: (server: Server, address: AddressInfo) => void;
}

interface ParsedCommand {
  command: CliCommand;
  args: string[];
}

interface ReportArgs {
  preview: boolean;
  verbose: boolean;
  format: ReportFormat;
  user?: string;
  days?: string;
  from?: string;
  to?: string;
  timezone?: string;
  repo?: string;
}

interface ServeArgs {
  verbose: boolean;
  host?: string;
  port?: number;
}

interface InitArgs {
  force: boolean;
  repo?: string;
  timezone?: string;
}

function parseCommand(argv: string[]): ParsedCommand {
  const command = argv[0] ?? "help";
  const args = argv.slice(1);
  if (
    command === "metrics" ||
    command === "team" ||
    command === "serve" ||
    command === "validate" ||
    command === "init"
  ) {
    return { command, args };
  }
  return { command: "help", args: [] };
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseReportArgs(args: string[], options: { allowUser: boolean }): ReportArgs {
  const result: ReportArgs = { preview: false, verbose: false, format: "markdown" };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--preview") {
      result.preview = true;
      continue;
    }

    if (arg === "--verbose") {
      result.verbose = true;
      continue;
    }

    if (arg === "--user" && options.allowUser) {
      result.user = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--days") {
      result.days = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--from") {
      result.from = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--to") {
      result.to = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--timezone") {
      result.timezone = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--repo") {
      result.repo = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--format") {
      const value = takeValue(args, i, arg);
      if (value !== "markdown" && value !== "json") {
        throw new Error(`Invalid --format value: ${value}`);
      }
      result.format = value;
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  if (result.days !== undefined && (result.from !== undefined || result.to !== undefined)) {
    throw new Error("Use either --days or --from/--to, not both");
  }

  return result;
}

function parseServeArgs(args: string[]): ServeArgs {
  const result: ServeArgs = { verbose: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--verbose") {
      result.verbose = true;
      continue;
    }

    if (arg === "--host") {
      result.host = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--port") {
      const value = takeValue(args, i, arg);
      const port = Number(value);
      if (!/^\d+$/.test(value) || port > 65535) {
        throw new Error(`Invalid --port value: ${value}`);
      }
      result.port = port;
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return result;
}

function parseInitArgs(args: string[]): InitArgs {
  const result: InitArgs = { force: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--force") {
      result.force = true;
      continue;
    }

    if (arg === "--repo") {
      result.repo = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--timezone") {
      result.timezone = takeValue(args, i, arg);
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return result;
}

async function loadValidatedConfig(cwd: string, io: CliIO): Promise<PulseConfig | null> {
  try {
    return await loadConfig(cwd);
  } catch (error: unknown) {
    io.error(`Cannot load ${CONFIG_FILE_NAME}`);
    io.error(formatConfigError(error));
    return null;
  }
}

function resolveRepo(args: ReportArgs, config: PulseConfig): RepoRef {
  if (args.repo) {
    return parseRepoRef(args.repo);
  }
  const repo = configuredRepo(config);
  if (!repo) {
    throw new Error(`Missing repository. Set repository in ${CONFIG_FILE_NAME} or pass --repo owner/name.`);
  }
  return repo;
}

function createReportService(
  cwd: string,
  config: PulseConfig,
  io: CliIO,
  verbose: boolean,
  runtimeOptions: CliRuntimeOptions
): ReportService {
  return new ReportService({
    cwd,
    config,
    logger: createProviderLogger(io, verbose),
    ...(runtimeOptions.createTransport ? { createTransport: runtimeOptions.createTransport } : {}),
    ...(runtimeOptions.env ? { env: runtimeOptions.env } : {})
  });
}

async function emitReport(
  cwd: string,
  io: CliIO,
  args: ReportArgs,
  report: { kind: "metrics" | "team"; name: string; content: string; statsLine: string }
): Promise<void> {
  if (args.preview) {
    io.log(report.content);
    return;
  }

  const files = await writeReportFiles({
    cwd,
    kind: report.kind,
    name: report.name,
    format: args.format,
    content: report.content
  });
  io.log(`Created ${files.reportFile}`);
  io.log(`Updated ${files.latestFile}`);
  io.log(report.statsLine);
}

async function runMetrics(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  const config = await loadValidatedConfig(cwd, io);
  if (!config) {
    return 1;
  }

  try {
    const parsed = parseReportArgs(args, { allowUser: true });
    const user = parsed.user?.trim();
    if (!user) {
      throw new Error("Missing required option: --user");
    }

    const now = runtimeOptions.now?.() ?? new Date();
    const { window, dateRange } = resolveRequestWindow(
      { days: parsed.days, fromDate: parsed.from, toDate: parsed.to, timezone: parsed.timezone },
      config,
      now
    );
    const repo = resolveRepo(parsed, config);
    const reports = createReportService(cwd, config, io, parsed.verbose, runtimeOptions);
    const contributions = await reports.contributions(user, window, repo);

    const response = formatMetricsResponse(contributions, { user, repository: repo, window, dateRange, fetchedAt: now });
    const content =
      parsed.format === "json"
        ? JSON.stringify(response, null, 2)
        : renderContributionsReport(contributions, { user, repository: repo, window });

    await emitReport(cwd, io, parsed, {
      kind: "metrics",
      name: `${user}_${window.fromDate}_to_${window.toDate}`,
      content,
      statsLine: `Stats: total_actions=${response.summary.total_actions}, issue_triage=${response.summary.by_category.issue_triage}, code_reviews=${response.summary.by_category.code_reviews}`
    });
    return 0;
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runTeam(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  const config = await loadValidatedConfig(cwd, io);
  if (!config) {
    return 1;
  }

  try {
    const parsed = parseReportArgs(args, { allowUser: false });
    if (config.team.members.length === 0) {
      io.error("team.members is empty; every item will count as unattended for the team roster.");
    }

    const now = runtimeOptions.now?.() ?? new Date();
    const { window } = resolveRequestWindow(
      { days: parsed.days, fromDate: parsed.from, toDate: parsed.to, timezone: parsed.timezone },
      config,
      now
    );
    const repo = resolveRepo(parsed, config);
    const reports = createReportService(cwd, config, io, parsed.verbose, runtimeOptions);
    const report = await reports.engagement(window, repo);

    const content =
      parsed.format === "json"
        ? JSON.stringify(formatTeamEngagementResponse(report, { repository: repo, window, fetchedAt: now }), null, 2)
        : renderEngagementReport(report, { repository: repo, window });

    await emitReport(cwd, io, parsed, {
      kind: "team",
      name: `${window.fromDate}_to_${window.toDate}`,
      content,
      statsLine: `Stats: issues=${report.team.issue.totalIssues}, team_engaged=${report.team.issue.teamEngaged}, prs=${report.team.pr.totalPrs}, team_engaged_prs=${report.team.pr.teamEngaged}`
    });
    return 0;
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runServe(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  const config = await loadValidatedConfig(cwd, io);
  if (!config) {
    return 1;
  }

  let parsed: ServeArgs;
  try {
    parsed = parseServeArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const handler = createApiHandler({
    config,
    io,
    reports: createReportService(cwd, config, io, parsed.verbose, runtimeOptions),
    ...(runtimeOptions.now ? { now: runtimeOptions.now } : {})
  });
  const server = createApiServer(handler, io);
  const host = parsed.host ?? config.server.host;

  let address: AddressInfo;
  try {
    address = await listen(server, host, parsed.port ?? config.server.port);
  } catch (error: unknown) {
    io.error(`Cannot start server: ${formatConfigError(error)}`);
    return 1;
  }

  io.log(`Listening on http://${host}:${address.port}`);
  const stop = (): void => {
    server.close();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  const closed = once(server, "close");
  runtimeOptions.onListening?.(server, address);

  try {
    await closed;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
  io.log("Server stopped.");
  return 0;
}

async function runValidate(cwd: string, io: CliIO, runtimeOptions: CliRuntimeOptions): Promise<number> {
  try {
    const config = await loadConfig(cwd);
    if (!config.repository) {
      io.error("Config validation failed.");
      io.error("repository must be set to owner/name.");
      return 1;
    }

    const tokenKey = config.github.tokenEnv;
    const token = await loadToken(cwd, tokenKey, runtimeOptions.env);
    if (!token) {
      io.error("Config validation failed.");
      io.error(`Missing token value for ${tokenKey} in environment or .env.`);
      return 1;
    }

    io.log("Config is valid.");
    io.log(`Repository: ${config.repository}`);
    io.log(`Timezone: ${config.timezone}`);
    io.log(`Team members: ${config.team.members.length}, contributors: ${config.team.contributors.length}`);
    return 0;
  } catch (error: unknown) {
    io.error("Config validation failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await access(targetPath);
    return true;
  } catch {
    return false;
  }
}

async function runInit(cwd: string, io: CliIO, args: string[]): Promise<number> {
  try {
    const parsed = parseInitArgs(args);
    const configPath = path.join(cwd, CONFIG_FILE_NAME);
    if (!parsed.force && (await pathExists(configPath))) {
      io.error(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`);
      return 1;
    }

    const config = pulseConfigSchema.parse({
      ...createDefaultConfig(),
      ...(parsed.repo ? { repository: repoFullName(parseRepoRef(parsed.repo)) } : {}),
      ...(parsed.timezone ? { timezone: parsed.timezone } : {})
    });
    await writeFile(configPath, serializeConfig(config), "utf-8");

    io.log(`Created ${configPath}`);
    if (!config.repository) {
      io.log(`Set repository in ${CONFIG_FILE_NAME} before fetching reports.`);
    }
    io.log(`Put your token in ${config.github.tokenEnv} or .env, then run \`maintainer-pulse validate\`.`);
    return 0;
  } catch (error: unknown) {
    io.error("Initialization failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

function printHelp(io: CliIO): void {
  io.log("maintainer-pulse CLI");
  io.log("Usage: maintainer-pulse <metrics|team|serve|validate|init>");
  io.log("Commands:");
  io.log("  metrics   contributions of one user in the configured repository");
  io.log("  team      team and contributor engagement for issues and pull requests");
  io.log("  serve     start the JSON API (/api/health, /api/metrics, /api/team-engagement)");
  io.log("  validate  validate .maintainer-pulse.yml and token availability");
  io.log("  init      write a starter .maintainer-pulse.yml");
  io.log("Report options:");
  io.log("  --user <login>      required for metrics");
  io.log("  --days <n>          relative window ending now (default from window.defaultDays)");
  io.log("  --from <YYYY-MM-DD> start date, inclusive (with --to)");
  io.log("  --to <YYYY-MM-DD>   end date, inclusive (with --from)");
  io.log("  --timezone <IANA>   timezone for dates (default from config)");
  io.log("  --repo <owner/repo> override the configured repository");
  io.log("  --format <value>    markdown|json");
  io.log("  --preview           print the report without writing files");
  io.log("  --verbose           log every fetched page");
  io.log("Serve options:");
  io.log("  --host <host>       default from server.host");
  io.log("  --port <port>       default from server.port");
  io.log("Init options:");
  io.log("  --repo <owner/repo>");
  io.log("  --timezone <IANA timezone>");
  io.log("  --force             overwrite an existing config");
}

export async function runCli(
  argv: string[],
  cwd = process.cwd(),
  runtimeOptions: CliRuntimeOptions = {}
): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  const parsed = parseCommand(argv);

  switch (parsed.command) {
    case "metrics":
      return runMetrics(cwd, io, parsed.args, runtimeOptions);
    case "team":
      return runTeam(cwd, io, parsed.args, runtimeOptions);
    case "serve":
      return runServe(cwd, io, parsed.args, runtimeOptions);
    case "validate":
      return runValidate(cwd, io, runtimeOptions);
    case "init":
      return runInit(cwd, io, parsed.args);
    default:
      printHelp(io);
      return 0;
  }
}
