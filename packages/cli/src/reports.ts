import {
  PulseError,
  resolveDateWindow,
  resolveDaysBackWindow,
  type Contributions,
  type EngagementReport,
  type RepoRef,
  type ResolvedWindow
} from "@maintainer-pulse/core";
import {
  GithubGraphqlClient,
  getContributionsBy,
  getEngagementReport,
  type GraphqlTransport,
  type ProviderLogger
} from "@maintainer-pulse/provider-github";
import { labelRulesOf, type PulseConfig } from "./config.js";
import { loadToken } from "./env.js";

export type ParameterErrorCode = "MISSING_PARAMETER" | "INVALID_PARAMETER";

export class ParameterError extends PulseError {
  readonly code: ParameterErrorCode;

  constructor(code: ParameterErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export interface WindowParams {
  days?: string | undefined;
  fromDate?: string | undefined;
  toDate?: string | undefined;
  timezone?: string | undefined;
}

export interface RequestWindow {
  window: ResolvedWindow;
  /** True when the window came from an explicit calendar range. */
  dateRange: boolean;
}

function parseDays(raw: string, maxDays: number): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ParameterError("INVALID_PARAMETER", "Invalid days parameter: must be an integer");
  }
  const days = Number(trimmed);
  if (days < 1 || days > maxDays) {
    throw new ParameterError("INVALID_PARAMETER", `Days parameter must be between 1 and ${maxDays}`);
  }
  return days;
}

export function resolveRequestWindow(params: WindowParams, config: PulseConfig, now: Date): RequestWindow {
  const timezone = params.timezone?.trim() || config.timezone;

  if (params.fromDate !== undefined || params.toDate !== undefined) {
    if (!params.fromDate || !params.toDate) {
      throw new ParameterError("MISSING_PARAMETER", "Both from_date and to_date are required for a date range");
    }
    const window = resolveDateWindow(
      { fromDate: params.fromDate.trim(), toDate: params.toDate.trim(), timezone },
      { now, maxSpanDays: config.window.maxSpanDays }
    );
    return { window, dateRange: true };
  }

  const days = params.days === undefined ? config.window.defaultDays : parseDays(params.days, config.window.maxDays);
  return { window: resolveDaysBackWindow(days, { now, timezone }), dateRange: false };
}

export function resolveTargetRepo(
  overrides: { owner?: string | undefined; repo?: string | undefined },
  configured: RepoRef | undefined
): RepoRef {
  const owner = overrides.owner?.trim() || configured?.owner;
  const repo = overrides.repo?.trim() || configured?.repo;
  if (!owner || !repo) {
    throw new ParameterError("INVALID_PARAMETER", "Owner and repo must be non-empty strings");
  }
  return { owner, repo };
}

export type TransportFactory = (token: string) => GraphqlTransport;

export interface ReportServiceOptions {
  cwd: string;
  config: PulseConfig;
  createTransport?: TransportFactory;
  logger?: ProviderLogger;
  env?: NodeJS.ProcessEnv;
}

export interface ReportSource {
  contributions(user: string, window: ResolvedWindow, repo: RepoRef): Promise<Contributions>;
  engagement(window: ResolvedWindow, repo: RepoRef): Promise<EngagementReport>;
}

/** Fetches reports for one configuration; the transport is created on first use. */
export class ReportService implements ReportSource {
  private readonly options: ReportServiceOptions;
  private transport: GraphqlTransport | undefined;

  constructor(options: ReportServiceOptions) {
    this.options = options;
  }

  private async getTransport(): Promise<GraphqlTransport> {
    if (this.transport) {
      return this.transport;
    }
    const { config } = this.options;
    const token = (await loadToken(this.options.cwd, config.github.tokenEnv, this.options.env)) ?? "";
    const transport =
      this.options.createTransport?.(token) ??
      new GithubGraphqlClient({
        token,
        ...(config.github.baseUrl ? { baseUrl: config.github.baseUrl } : {}),
        ...(this.options.logger ? { logger: this.options.logger } : {})
      });
    this.transport = transport;
    return transport;
  }

  async contributions(user: string, window: ResolvedWindow, repo: RepoRef): Promise<Contributions> {
    const transport = await this.getTransport();
    return getContributionsBy(user, window, repo, {
      transport,
      pageSize: this.options.config.github.pageSize,
      labelRules: labelRulesOf(this.options.config),
      ...(this.options.logger ? { logger: this.options.logger } : {})
    });
  }

  async engagement(window: ResolvedWindow, repo: RepoRef): Promise<EngagementReport> {
    const transport = await this.getTransport();
    const { team } = this.options.config;
    return getEngagementReport(
      window,
      { team: team.members, contributors: team.contributors },
      repo,
      {
        transport,
        pageSize: this.options.config.github.pageSize,
        labelRules: labelRulesOf(this.options.config),
        ...(this.options.logger ? { logger: this.options.logger } : {})
      }
    );
  }
}
