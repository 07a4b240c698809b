import { z } from "zod";
import { DataShapeError } from "@maintainer-pulse/core";
import type { Closer, CloseEventFact, IssueFacts, LabelEventFact, PrFacts } from "@maintainer-pulse/core";
import type { QueryDocument } from "./queries.js";

const actorSchema = z.object({ login: z.string() }).nullish();

const repositorySchema = z.object({ nameWithOwner: z.string() }).nullish();

const closerSchema = z
  .object({
    __typename: z.string(),
    number: z.number().optional()
  })
  .nullish();

const timelineEventSchema = z.object({
  __typename: z.string(),
  createdAt: z.string().optional(),
  actor: actorSchema,
  label: z.object({ name: z.string() }).nullish(),
  closer: closerSchema
});

const timelineSchema = z
  .object({
    nodes: z.array(timelineEventSchema.nullable()).nullish()
  })
  .nullish();

const authorListSchema = z
  .object({
    nodes: z.array(z.object({ author: actorSchema }).nullable()).nullish()
  })
  .nullish();

export const connectionSchema = z.object({
  pageInfo: z.object({
    hasNextPage: z.boolean().optional(),
    hasPreviousPage: z.boolean().optional(),
    endCursor: z.string().nullish(),
    startCursor: z.string().nullish()
  }),
  nodes: z.array(z.unknown()).nullish()
});

export const userIssueCommentNodeSchema = z.object({
  url: z.string(),
  createdAt: z.string(),
  publishedAt: z.string().nullish(),
  issue: z.object({
    number: z.number(),
    title: z.string(),
    author: actorSchema,
    repository: repositorySchema
  }),
  pullRequest: z.object({ number: z.number() }).nullish()
});

export const userReviewNodeSchema = z.object({
  occurredAt: z.string(),
  pullRequest: z.object({
    number: z.number(),
    title: z.string(),
    url: z.string(),
    author: actorSchema
  }),
  pullRequestReview: z.object({ url: z.string(), state: z.string() }).nullish(),
  repository: repositorySchema
});

export const recentIssueNodeSchema = z.object({
  number: z.number(),
  title: z.string(),
  url: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  author: actorSchema,
  timelineItems: timelineSchema
});

export const recentPullRequestNodeSchema = recentIssueNodeSchema.extend({
  state: z.enum(["OPEN", "CLOSED", "MERGED"])
});

export const searchIssueNodeSchema = z.object({
  number: z.number(),
  title: z.string(),
  url: z.string(),
  state: z.string(),
  createdAt: z.string(),
  author: actorSchema,
  comments: authorListSchema,
  timelineItems: timelineSchema
});

export const searchPullRequestNodeSchema = searchIssueNodeSchema.extend({
  state: z.enum(["OPEN", "CLOSED", "MERGED"]),
  reviews: authorListSchema
});

export type Connection = z.infer<typeof connectionSchema>;
export type TimelineEvent = z.infer<typeof timelineEventSchema>;
export type UserIssueCommentNode = z.infer<typeof userIssueCommentNodeSchema>;
export type UserReviewNode = z.infer<typeof userReviewNodeSchema>;
export type RecentIssueNode = z.infer<typeof recentIssueNodeSchema>;
export type RecentPullRequestNode = z.infer<typeof recentPullRequestNodeSchema>;
export type SearchIssueNode = z.infer<typeof searchIssueNodeSchema>;
export type SearchPullRequestNode = z.infer<typeof searchPullRequestNodeSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseShape<T>(
  document: QueryDocument,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DataShapeError(document.name, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walks nested objects, returning undefined as soon as a level is missing or null. */
export function pickPath(data: unknown, path: string[]): unknown {
  let current: unknown = data;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
    if (current === null || current === undefined) {
      return undefined;
    }
  }
  return current;
}

export function loginOf(actor: { login: string } | null | undefined): string | null {
  return actor?.login ?? null;
}

export function toCloser(closer: TimelineEvent["closer"]): Closer {
  if (closer === undefined) {
    return { kind: "unknown" };
  }
  if (closer === null) {
    return { kind: "manual" };
  }
  if (closer.__typename === "PullRequest" && typeof closer.number === "number") {
    return { kind: "pull_request", number: closer.number };
  }
  if (closer.__typename === "Commit") {
    return { kind: "commit" };
  }
  return { kind: "manual" };
}

export function timelineEvents(timeline: RecentIssueNode["timelineItems"]): TimelineEvent[] {
  return (timeline?.nodes ?? []).filter((event): event is TimelineEvent => event !== null);
}

function authorsOf(list: SearchIssueNode["comments"]): Array<string | null> {
  return (list?.nodes ?? []).map((node) => loginOf(node?.author));
}

export function toLabelEventFact(event: TimelineEvent): LabelEventFact | null {
  if (event.__typename !== "LabeledEvent" || !event.label || !event.createdAt) {
    return null;
  }
  return { actor: loginOf(event.actor), label: event.label.name, createdAt: event.createdAt };
}

export function toCloseEventFact(event: TimelineEvent): CloseEventFact | null {
  if (event.__typename !== "ClosedEvent" || !event.createdAt) {
    return null;
  }
  return { actor: loginOf(event.actor), createdAt: event.createdAt, closer: toCloser(event.closer) };
}

export function toIssueFacts(node: SearchIssueNode): IssueFacts {
  const events = timelineEvents(node.timelineItems);
  return {
    commentAuthors: authorsOf(node.comments),
    labelEvents: events.map(toLabelEventFact).filter((fact): fact is LabelEventFact => fact !== null),
    closeEvents: events.map(toCloseEventFact).filter((fact): fact is CloseEventFact => fact !== null)
  };
}

export function toPrFacts(node: SearchPullRequestNode): PrFacts {
  const events = timelineEvents(node.timelineItems);
  return {
    commentAuthors: authorsOf(node.comments),
    reviewAuthors: authorsOf(node.reviews),
    mergeActors: events
      .filter((event) => event.__typename === "MergedEvent")
      .map((event) => loginOf(event.actor)),
    closeActors: events
      .filter((event) => event.__typename === "ClosedEvent")
      .map((event) => loginOf(event.actor))
  };
}
