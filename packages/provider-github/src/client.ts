import { Octokit } from "@octokit/rest";
import { ConfigurationError, PulseError, TransportError, UpstreamError } from "@maintainer-pulse/core";
import type { UpstreamErrorEntry } from "@maintainer-pulse/core";
import type { ProviderLogger } from "./logger.js";
import { silentLogger } from "./logger.js";

export type GraphqlVariables = Record<string, string | number | boolean | null>;

/** Executes one GraphQL document and resolves with the response's `data` object. */
export interface GraphqlTransport {
  execute(document: string, variables: GraphqlVariables): Promise<unknown>;
}

export interface GithubGraphqlClientOptions {
  token?: string;
  baseUrl?: string;
  userAgent?: string;
  fetch?: typeof fetch;
  logger?: ProviderLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toUpstreamErrorEntry(entry: unknown): UpstreamErrorEntry {
  if (!isRecord(entry)) {
    return { message: String(entry) };
  }

  const path = Array.isArray(entry.path)
    ? entry.path.filter((part): part is string | number => typeof part === "string" || typeof part === "number")
    : undefined;

  return {
    message: typeof entry.message === "string" ? entry.message : JSON.stringify(entry),
    ...(typeof entry.type === "string" ? { type: entry.type } : {}),
    ...(path ? { path } : {})
  };
}

function responseBody(error: object): string {
  const response = "response" in error ? error.response : undefined;
  const data = isRecord(response) ? response.data : undefined;
  if (typeof data === "string") {
    return data;
  }
  if (data !== undefined) {
    return JSON.stringify(data);
  }
  return "message" in error ? String(error.message) : "";
}

function toTransportError(error: unknown): Error {
  if (error instanceof PulseError) {
    return error;
  }

  if (error && typeof error === "object" && "status" in error) {
    const status = error.status;
    if (typeof status === "number") {
      return new TransportError(status, responseBody(error));
    }
  }

  return error instanceof Error ? error : new Error(String(error));
}

export function readGraphqlPayload(payload: unknown): Record<string, unknown> {
  if (!isRecord(payload)) {
    return {};
  }

  if (Array.isArray(payload.errors)) {
    throw new UpstreamError(payload.errors.map(toUpstreamErrorEntry));
  }

  return isRecord(payload.data) ? payload.data : {};
}

export class GithubGraphqlClient implements GraphqlTransport {
  private readonly octokit: Octokit;

  constructor(options: GithubGraphqlClientOptions) {
    const token = options.token?.trim();
    if (!token) {
      throw new ConfigurationError(
        "A GitHub token is required. Set GITHUB_TOKEN or point github.tokenEnv at another variable."
      );
    }

    const logger = options.logger ?? silentLogger;
    this.octokit = new Octokit({
      auth: token,
      userAgent: options.userAgent ?? "maintainer-pulse/0.1.0",
      log: {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.debug(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.warn(message)
      },
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {})
    });
  }

  async execute(document: string, variables: GraphqlVariables): Promise<unknown> {
    let payload: unknown;
    try {
      const response = await this.octokit.request("POST /graphql", { query: document, variables });
      payload = response.data;
    } catch (error: unknown) {
      throw toTransportError(error);
    }

    return readGraphqlPayload(payload);
  }
}
