import { createServer, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import {
  ConfigurationError,
  DataShapeError,
  TransportError,
  UpstreamError,
  WindowError,
  repoFullName,
  toIsoSeconds,
  type RepoRef
} from "@maintainer-pulse/core";
import {
  formatErrorResponse,
  formatMetricsResponse,
  formatTeamEngagementResponse,
  type ErrorResponse,
  type MetricsResponse,
  type TeamEngagementResponse
} from "@maintainer-pulse/renderer-json";
import { configuredRepo, type PulseConfig } from "./config.js";
import type { CliIO } from "./io.js";
import {
  ParameterError,
  resolveRequestWindow,
  resolveTargetRepo,
  type ReportSource,
  type RequestWindow
} from "./reports.js";

export interface HealthResponse {
  status: "ok";
  timestamp: string;
}

export type ApiBody = HealthResponse | MetricsResponse | TeamEngagementResponse | ErrorResponse;

export interface ApiRequest {
  method: string;
  url: string;
}

export interface ApiResponse {
  status: number;
  body: ApiBody;
}

export type ApiHandler = (request: ApiRequest) => Promise<ApiResponse>;

export interface ApiHandlerDependencies {
  config: PulseConfig;
  reports: ReportSource;
  io: CliIO;
  now?: () => Date;
}

type NotFoundCode = "USER_NOT_FOUND" | "REPOSITORY_NOT_FOUND";

export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/gh[pousr]_[a-zA-Z0-9]{36,}/g, "[REDACTED_TOKEN]")
    .replace(/\w+:\/\/[^\s]+@[^\s]+/g, "[REDACTED_CONNECTION_STRING]")
    .replace(/\b[A-Z_]+=[^\s]+/g, "[REDACTED_ENV_VAR]")
    .replace(/[A-Za-z]:\\[^\s]+\.[cm]?[jt]s\b/g, "[FILE_PATH]")
    .replace(/\/[^\s]+\.[cm]?[jt]s\b/g, "[FILE_PATH]");
}

function isUpstreamFailure(error: unknown): error is Error {
  return error instanceof TransportError || error instanceof UpstreamError || error instanceof DataShapeError;
}

function hasUpstreamType(error: Error, type: string): boolean {
  return error instanceof UpstreamError && error.errors.some((entry) => entry.type === type);
}

function isRateLimited(error: Error): boolean {
  if (error instanceof TransportError && error.status === 429) {
    return true;
  }
  return hasUpstreamType(error, "RATE_LIMITED") || /rate limit/i.test(error.message);
}

function isNotFound(error: Error): boolean {
  if (error instanceof TransportError && error.status === 404) {
    return true;
  }
  return hasUpstreamType(error, "NOT_FOUND") || /not found|could not resolve/i.test(error.message);
}

function isAuthenticationFailure(error: Error): boolean {
  if (error instanceof TransportError && error.status === 401) {
    return true;
  }
  return /unauthorized|bad credentials/i.test(error.message);
}

function errorResponse(status: number, code: string, message: string, now: Date): ApiResponse {
  return { status, body: formatErrorResponse(code, message, now) };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createApiHandler(deps: ApiHandlerDependencies): ApiHandler {
  const now = deps.now ?? (() => new Date());
  const { config, io, reports } = deps;

  const failure = (error: unknown, notFound: NotFoundCode, subject: string, at: Date): ApiResponse => {
    if (error instanceof ParameterError || error instanceof WindowError) {
      return errorResponse(400, error.code, error.message, at);
    }
    if (error instanceof ConfigurationError) {
      io.error(`Configuration error: ${error.message}`);
      return errorResponse(500, "CONFIGURATION_ERROR", error.message, at);
    }
    if (!isUpstreamFailure(error)) {
      io.error(`Unexpected error: ${describeError(error)}`);
      return errorResponse(500, "INTERNAL_ERROR", "An unexpected error occurred", at);
    }

    const sanitized = sanitizeErrorMessage(error.message);
    io.error(`GitHub API error for ${subject}: ${sanitized}`);
    if (isRateLimited(error)) {
      return errorResponse(429, "RATE_LIMIT_EXCEEDED", "GitHub API rate limit exceeded. Please try again later.", at);
    }
    if (isNotFound(error)) {
      const message =
        notFound === "USER_NOT_FOUND" ? `GitHub user "${subject}" not found` : `Repository "${subject}" not found`;
      return errorResponse(404, notFound, message, at);
    }
    if (isAuthenticationFailure(error)) {
      return errorResponse(500, "AUTHENTICATION_ERROR", "GitHub authentication failed. Check your token.", at);
    }
    return errorResponse(500, "GITHUB_API_ERROR", `Error fetching data from GitHub: ${sanitized}`, at);
  };

  const windowFrom = (params: URLSearchParams, at: Date): RequestWindow =>
    resolveRequestWindow(
      {
        days: params.get("days") ?? undefined,
        fromDate: params.get("from_date") ?? undefined,
        toDate: params.get("to_date") ?? undefined,
        timezone: params.get("timezone") ?? undefined
      },
      config,
      at
    );

  const repoFrom = (params: URLSearchParams): RepoRef =>
    resolveTargetRepo(
      { owner: params.get("owner") ?? undefined, repo: params.get("repo") ?? undefined },
      configuredRepo(config)
    );

  const metrics = async (params: URLSearchParams, at: Date): Promise<ApiResponse> => {
    const user = params.get("user")?.trim() ?? "";
    if (!user) {
      return errorResponse(400, "MISSING_PARAMETER", "Missing required parameter: user", at);
    }

    try {
      const { window, dateRange } = windowFrom(params, at);
      const repo = repoFrom(params);
      io.log(`Fetching metrics for user=${user}, days=${window.days}, repo=${repoFullName(repo)}`);
      const contributions = await reports.contributions(user, window, repo);
      const body = formatMetricsResponse(contributions, {
        user,
        repository: repo,
        window,
        dateRange,
        fetchedAt: now()
      });
      return { status: 200, body };
    } catch (error: unknown) {
      return failure(error, "USER_NOT_FOUND", user, at);
    }
  };

  const teamEngagement = async (params: URLSearchParams, at: Date): Promise<ApiResponse> => {
    let subject = config.repository ?? "(unset)";
    try {
      const { window } = windowFrom(params, at);
      const repo = repoFrom(params);
      subject = repoFullName(repo);
      io.log(`Fetching team engagement for repo=${subject}, from=${window.fromDate}, to=${window.toDate}`);
      const report = await reports.engagement(window, repo);
      return { status: 200, body: formatTeamEngagementResponse(report, { repository: repo, window, fetchedAt: now() }) };
    } catch (error: unknown) {
      return failure(error, "REPOSITORY_NOT_FOUND", subject, at);
    }
  };

  return async (request) => {
    const at = now();
    const url = new URL(request.url, "http://localhost");
    const route = url.pathname.replace(/\/+$/, "") || "/";
    const known = route === "/api/health" || route === "/api/metrics" || route === "/api/team-engagement";

    if (!known) {
      return errorResponse(404, "NOT_FOUND", `No route for ${url.pathname}`, at);
    }
    if (request.method !== "GET") {
      return errorResponse(405, "METHOD_NOT_ALLOWED", `Method ${request.method} is not allowed`, at);
    }

    if (route === "/api/health") {
      return { status: 200, body: { status: "ok", timestamp: toIsoSeconds(at) } };
    }
    if (route === "/api/metrics") {
      return metrics(url.searchParams, at);
    }
    return teamEngagement(url.searchParams, at);
  };
}

function sendJson(res: ServerResponse, response: ApiResponse): void {
  const payload = JSON.stringify(response.body);
  res.writeHead(response.status, {
    "content-type": "application/json; charset=utf-8",
    "content-length": Buffer.byteLength(payload)
  });
  res.end(payload);
}

export function createApiServer(handler: ApiHandler, io: CliIO): Server {
  return createServer((req, res) => {
    const started = Date.now();
    const method = req.method ?? "GET";
    const url = req.url ?? "/";
    handler({ method, url })
      .then((response) => {
        sendJson(res, response);
        io.log(`${method} ${url} ${response.status} ${Date.now() - started}ms`);
      })
      .catch((error: unknown) => {
        io.error(`Unhandled error for ${method} ${url}: ${describeError(error)}`);
        sendJson(res, errorResponse(500, "INTERNAL_ERROR", "An unexpected error occurred", new Date()));
      });
  });
}

export async function listen(server: Server, host: string, port: number): Promise<AddressInfo> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error(`Server is not listening on a TCP port: ${String(address)}`);
  }
  return address;
}
