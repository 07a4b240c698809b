import type { GraphqlTransport, GraphqlVariables } from "./client.js";
import type { ProviderLogger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { QueryDocument } from "./queries.js";
import type { Connection } from "./schemas.js";
import { connectionSchema, parseShape, pickPath } from "./schemas.js";

export interface PaginateOptions<T> {
  transport: GraphqlTransport;
  document: QueryDocument;
  variables: GraphqlVariables;
  /** Path from `data` to the paged connection, e.g. `["user", "issueComments"]`. */
  connectionPath: string[];
  /** Parses one raw node; returning null skips it. */
  parseNode: (node: unknown) => T | null;
  relevant: (item: T) => boolean;
  /** Signals that no later page can hold relevant items. The current page is still scanned to the end. */
  stop?: (item: T) => boolean;
  logger?: ProviderLogger;
}

interface PageState {
  hasMore: boolean;
  cursor: string | null;
}

function readPageState(document: QueryDocument, pageInfo: Connection["pageInfo"]): PageState {
  if (document.direction === "backward") {
    return { hasMore: pageInfo.hasPreviousPage ?? false, cursor: pageInfo.startCursor ?? null };
  }
  return { hasMore: pageInfo.hasNextPage ?? false, cursor: pageInfo.endCursor ?? null };
}

export async function paginate<T>(options: PaginateOptions<T>): Promise<T[]> {
  const { transport, document } = options;
  const logger = options.logger ?? silentLogger;
  const cursorVariable = document.direction === "backward" ? "before" : "after";
  const collected: T[] = [];
  let cursor: string | null = null;
  let page = 0;

  for (;;) {
    page += 1;
    const data = await transport.execute(document.text, {
      ...options.variables,
      [cursorVariable]: cursor
    });

    const raw = pickPath(data, options.connectionPath);
    if (raw === undefined) {
      logger.warn(`${document.name}: ${options.connectionPath.join(".")} missing, stopping`, { page });
      break;
    }

    const connection = parseShape(document, connectionSchema, raw);
    let stopRequested = false;
    let kept = 0;
    const nodes = connection.nodes ?? [];

    for (const node of nodes) {
      if (node === null || node === undefined) {
        continue;
      }
      const item = options.parseNode(node);
      if (item === null) {
        continue;
      }
      if (options.stop?.(item)) {
        stopRequested = true;
        continue;
      }
      if (options.relevant(item)) {
        collected.push(item);
        kept += 1;
      }
    }

    logger.debug(`${document.name}: page ${page}`, { page, nodes: nodes.length, kept });

    const state = readPageState(document, connection.pageInfo);
    if (stopRequested || !state.hasMore) {
      break;
    }
    if (!state.cursor) {
      logger.warn(`${document.name}: more pages reported without a cursor, stopping`, { page });
      break;
    }
    cursor = state.cursor;
  }

  return collected;
}
