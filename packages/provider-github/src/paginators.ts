import type { z } from "zod";
import type { RepoRef, TimeWindow } from "@maintainer-pulse/core";
import { isBeforeWindow, isWithinWindow, repoFullName, sameRepository, toIsoSeconds } from "@maintainer-pulse/core";
import type { GraphqlTransport } from "./client.js";
import type { ProviderLogger } from "./logger.js";
import { paginate } from "./paginate.js";
import type { QueryDocument } from "./queries.js";
import {
  REPO_RECENT_ISSUES,
  REPO_RECENT_PULL_REQUESTS,
  TEAM_ISSUE_SEARCH,
  TEAM_PR_SEARCH,
  USER_ISSUE_COMMENTS,
  USER_PR_REVIEWS
} from "./queries.js";
import type {
  RecentIssueNode,
  RecentPullRequestNode,
  SearchIssueNode,
  SearchPullRequestNode,
  UserIssueCommentNode,
  UserReviewNode
} from "./schemas.js";
import {
  isRecord,
  parseShape,
  recentIssueNodeSchema,
  recentPullRequestNodeSchema,
  searchIssueNodeSchema,
  searchPullRequestNodeSchema,
  userIssueCommentNodeSchema,
  userReviewNodeSchema
} from "./schemas.js";

export const DEFAULT_PAGE_SIZE = 100;
/** Page size of the repository issue and pull request scans. */
export const RECENT_PAGE_SIZE = 50;

export interface PaginatorContext {
  transport: GraphqlTransport;
  logger?: ProviderLogger;
  /** Page size for user and search queries (1..100). */
  pageSize?: number;
}

function pageSizeOf(context: PaginatorContext): number {
  const size = context.pageSize ?? DEFAULT_PAGE_SIZE;
  return Math.min(Math.max(Math.trunc(size), 1), 100);
}

function nodeParser<T>(
  document: QueryDocument,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (node: unknown) => T {
  return (node) => parseShape(document, schema, node);
}

// Search results mix node types; fragments that do not apply come back as bare objects.
function searchNodeParser<T>(
  document: QueryDocument,
  typename: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (node: unknown) => T | null {
  return (node) => {
    if (!isRecord(node) || node.__typename !== typename) {
      return null;
    }
    return parseShape(document, schema, node);
  };
}

export function commentTimestamp(node: UserIssueCommentNode): string {
  return node.publishedAt ?? node.createdAt;
}

export function buildSearchQuery(repo: RepoRef, kind: "issue" | "pr", window: TimeWindow): string {
  return `repo:${repoFullName(repo)} is:${kind} created:>=${toIsoSeconds(window.from)}`;
}

export async function fetchUserIssueComments(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<UserIssueCommentNode[]> {
  return paginate({
    transport: context.transport,
    document: USER_ISSUE_COMMENTS,
    variables: { login: actor, pageSize: pageSizeOf(context) },
    connectionPath: ["user", "issueComments"],
    parseNode: nodeParser(USER_ISSUE_COMMENTS, userIssueCommentNodeSchema),
    stop: (node) => isBeforeWindow(commentTimestamp(node), window),
    relevant: (node) =>
      sameRepository(node.issue.repository?.nameWithOwner, repo) &&
      isWithinWindow(commentTimestamp(node), window),
    ...(context.logger ? { logger: context.logger } : {})
  });
}

export async function fetchUserPullRequestReviews(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<UserReviewNode[]> {
  return paginate({
    transport: context.transport,
    document: USER_PR_REVIEWS,
    variables: {
      login: actor,
      from: toIsoSeconds(window.from),
      to: toIsoSeconds(window.to),
      pageSize: pageSizeOf(context)
    },
    connectionPath: ["user", "contributionsCollection", "pullRequestReviewContributions"],
    parseNode: nodeParser(USER_PR_REVIEWS, userReviewNodeSchema),
    relevant: (node) =>
      sameRepository(node.repository?.nameWithOwner, repo) && isWithinWindow(node.occurredAt, window),
    ...(context.logger ? { logger: context.logger } : {})
  });
}

export async function fetchRecentIssues(
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<RecentIssueNode[]> {
  return paginate({
    transport: context.transport,
    document: REPO_RECENT_ISSUES,
    variables: {
      owner: repo.owner,
      name: repo.repo,
      since: toIsoSeconds(window.from),
      pageSize: RECENT_PAGE_SIZE
    },
    connectionPath: ["repository", "issues"],
    parseNode: nodeParser(REPO_RECENT_ISSUES, recentIssueNodeSchema),
    stop: (node) => isBeforeWindow(node.updatedAt, window),
    relevant: (node) => !isBeforeWindow(node.updatedAt, window),
    ...(context.logger ? { logger: context.logger } : {})
  });
}

export async function fetchRecentPullRequests(
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<RecentPullRequestNode[]> {
  return paginate({
    transport: context.transport,
    document: REPO_RECENT_PULL_REQUESTS,
    variables: {
      owner: repo.owner,
      name: repo.repo,
      pageSize: RECENT_PAGE_SIZE
    },
    connectionPath: ["repository", "pullRequests"],
    parseNode: nodeParser(REPO_RECENT_PULL_REQUESTS, recentPullRequestNodeSchema),
    stop: (node) => isBeforeWindow(node.updatedAt, window),
    relevant: (node) => !isBeforeWindow(node.updatedAt, window),
    ...(context.logger ? { logger: context.logger } : {})
  });
}

export async function searchIssuesCreated(
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<SearchIssueNode[]> {
  return paginate({
    transport: context.transport,
    document: TEAM_ISSUE_SEARCH,
    variables: { searchQuery: buildSearchQuery(repo, "issue", window), pageSize: pageSizeOf(context) },
    connectionPath: ["search"],
    parseNode: searchNodeParser(TEAM_ISSUE_SEARCH, "Issue", searchIssueNodeSchema),
    relevant: (node) => isWithinWindow(node.createdAt, window),
    ...(context.logger ? { logger: context.logger } : {})
  });
}

export async function searchPullRequestsCreated(
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<SearchPullRequestNode[]> {
  return paginate({
    transport: context.transport,
    document: TEAM_PR_SEARCH,
    variables: { searchQuery: buildSearchQuery(repo, "pr", window), pageSize: pageSizeOf(context) },
    connectionPath: ["search"],
    parseNode: searchNodeParser(TEAM_PR_SEARCH, "PullRequest", searchPullRequestNodeSchema),
    relevant: (node) => isWithinWindow(node.createdAt, window),
    ...(context.logger ? { logger: context.logger } : {})
  });
}
