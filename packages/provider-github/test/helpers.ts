import type { GraphqlTransport, GraphqlVariables } from "../src/client.js";

export const REPO = { owner: "acme", repo: "widgets" };
export const WINDOW = {
  from: new Date("2026-02-01T00:00:00Z"),
  to: new Date("2026-02-07T23:59:59Z")
};

export interface RecordedCall {
  operation: string;
  variables: GraphqlVariables;
}

/** Serves queued responses per operation name; an Error in the queue is thrown instead. */
export function scriptedTransport(pages: Record<string, unknown[]>): {
  transport: GraphqlTransport;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const queues = new Map(Object.entries(pages).map(([operation, queue]) => [operation, [...queue]]));

  const transport: GraphqlTransport = {
    async execute(document, variables) {
      const operation = document.match(/^query (\w+)/)?.[1] ?? "unknown";
      calls.push({ operation, variables });
      const next = queues.get(operation)?.shift();
      if (next === undefined) {
        throw new Error(`No scripted page left for ${operation}`);
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    }
  };

  return { transport, calls };
}

function nest(path: string[], leaf: unknown): unknown {
  return path.reduceRight<unknown>((value, key) => ({ [key]: value }), leaf);
}

export function forwardPage(path: string[], nodes: unknown[], endCursor?: string): unknown {
  return nest(path, {
    pageInfo: { hasNextPage: endCursor !== undefined, endCursor: endCursor ?? null },
    nodes
  });
}

export function backwardPage(path: string[], nodes: unknown[], startCursor?: string): unknown {
  return nest(path, {
    pageInfo: { hasPreviousPage: startCursor !== undefined, startCursor: startCursor ?? null },
    nodes
  });
}

export const COMMENTS_PATH = ["user", "issueComments"];
export const REVIEWS_PATH = ["user", "contributionsCollection", "pullRequestReviewContributions"];
export const ISSUES_PATH = ["repository", "issues"];
export const PULLS_PATH = ["repository", "pullRequests"];
export const SEARCH_PATH = ["search"];

function actor(login: string | null | undefined): { login: string } | null {
  return login ? { login } : null;
}

export function issueComment(options: {
  number: number;
  publishedAt: string;
  repo?: string;
  subjectAuthor?: string | null;
  onPullRequest?: boolean;
}): unknown {
  const repo = options.repo ?? "acme/widgets";
  const kind = options.onPullRequest ? "pull" : "issues";
  return {
    url: `https://github.com/${repo}/${kind}/${options.number}#issuecomment-${options.number}0`,
    createdAt: options.publishedAt,
    publishedAt: options.publishedAt,
    issue: {
      number: options.number,
      title: `Item ${options.number}`,
      author: actor(options.subjectAuthor),
      repository: { nameWithOwner: repo }
    },
    pullRequest: options.onPullRequest ? { number: options.number } : null
  };
}

export function review(options: {
  number: number;
  occurredAt: string;
  repo?: string;
  prAuthor?: string | null;
  state?: string;
}): unknown {
  const repo = options.repo ?? "acme/widgets";
  return {
    occurredAt: options.occurredAt,
    pullRequest: {
      number: options.number,
      title: `PR ${options.number}`,
      url: `https://github.com/${repo}/pull/${options.number}`,
      author: actor(options.prAuthor)
    },
    pullRequestReview: {
      url: `https://github.com/${repo}/pull/${options.number}#pullrequestreview-${options.number}0`,
      state: options.state ?? "APPROVED"
    },
    repository: { nameWithOwner: repo }
  };
}

export function labeledEvent(login: string | null, label: string, createdAt: string): unknown {
  return { __typename: "LabeledEvent", createdAt, actor: actor(login), label: { name: label } };
}

/** Pass `closer` as undefined to leave the closer field out entirely. */
export function closedEvent(
  login: string | null,
  createdAt: string,
  closer?: { __typename: string; number?: number } | null
): unknown {
  return {
    __typename: "ClosedEvent",
    createdAt,
    actor: actor(login),
    ...(closer === undefined ? {} : { closer })
  };
}

export function mergedEvent(login: string | null, createdAt: string): unknown {
  return { __typename: "MergedEvent", createdAt, actor: actor(login) };
}

export function recentIssue(options: {
  number: number;
  createdAt: string;
  updatedAt: string;
  author?: string | null;
  events?: unknown[];
}): unknown {
  return {
    number: options.number,
    title: `Issue ${options.number}`,
    url: `https://github.com/acme/widgets/issues/${options.number}`,
    createdAt: options.createdAt,
    updatedAt: options.updatedAt,
    author: actor(options.author),
    timelineItems: { nodes: options.events ?? [] }
  };
}

export function recentPullRequest(options: {
  number: number;
  state: "OPEN" | "CLOSED" | "MERGED";
  createdAt: string;
  updatedAt: string;
  author?: string | null;
  events?: unknown[];
}): unknown {
  return {
    number: options.number,
    title: `PR ${options.number}`,
    url: `https://github.com/acme/widgets/pull/${options.number}`,
    state: options.state,
    createdAt: options.createdAt,
    updatedAt: options.updatedAt,
    author: actor(options.author),
    timelineItems: { nodes: options.events ?? [] }
  };
}

export function searchIssue(options: {
  number: number;
  state?: "OPEN" | "CLOSED";
  createdAt: string;
  author?: string | null;
  commenters?: Array<string | null>;
  events?: unknown[];
}): unknown {
  return {
    __typename: "Issue",
    number: options.number,
    title: `Issue ${options.number}`,
    url: `https://github.com/acme/widgets/issues/${options.number}`,
    state: options.state ?? "OPEN",
    createdAt: options.createdAt,
    author: actor(options.author ?? "reporter"),
    comments: { nodes: (options.commenters ?? []).map((login) => ({ author: actor(login) })) },
    timelineItems: { nodes: options.events ?? [] }
  };
}

export function searchPullRequest(options: {
  number: number;
  state?: "OPEN" | "CLOSED" | "MERGED";
  createdAt: string;
  author?: string | null;
  commenters?: Array<string | null>;
  reviewers?: Array<string | null>;
  events?: unknown[];
}): unknown {
  return {
    __typename: "PullRequest",
    number: options.number,
    title: `PR ${options.number}`,
    url: `https://github.com/acme/widgets/pull/${options.number}`,
    state: options.state ?? "OPEN",
    createdAt: options.createdAt,
    author: actor(options.author ?? "contributor"),
    comments: { nodes: (options.commenters ?? []).map((login) => ({ author: actor(login) })) },
    reviews: { nodes: (options.reviewers ?? []).map((login) => ({ author: actor(login) })) },
    timelineItems: { nodes: options.events ?? [] }
  };
}
