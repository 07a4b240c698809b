import type {
  CommentRecord,
  IssueActivities,
  IssueClosedRecord,
  IssueLabeledRecord,
  LabelRules,
  PrActivityRecord,
  RepoRef,
  ReviewRecord,
  TimeWindow
} from "@maintainer-pulse/core";
import { isResolutionLabel, isWithinWindow, sameLogin } from "@maintainer-pulse/core";
import type { PaginatorContext } from "./paginators.js";
import {
  commentTimestamp,
  fetchRecentIssues,
  fetchRecentPullRequests,
  fetchUserIssueComments,
  fetchUserPullRequestReviews
} from "./paginators.js";
import type { RecentIssueNode, RecentPullRequestNode, TimelineEvent } from "./schemas.js";
import { loginOf, timelineEvents, toCloser } from "./schemas.js";

function performedBy(event: TimelineEvent, actor: string, window: TimeWindow): event is TimelineEvent & {
  createdAt: string;
} {
  return sameLogin(loginOf(event.actor), actor) && isWithinWindow(event.createdAt, window);
}

/** Comments by `actor` in the repository and window, minus comments on the actor's own pull requests. */
export async function getCommentsBy(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<CommentRecord[]> {
  const nodes = await fetchUserIssueComments(actor, window, repo, context);

  return nodes
    .filter((node) => !(node.pullRequest && sameLogin(loginOf(node.issue.author), actor)))
    .map((node) => ({
      number: node.issue.number,
      title: node.issue.title,
      url: node.url,
      publishedAt: commentTimestamp(node),
      onPullRequest: Boolean(node.pullRequest),
      subjectAuthor: loginOf(node.issue.author)
    }));
}

/** Reviews by `actor` in the repository and window, minus reviews of the actor's own pull requests. */
export async function getReviewsBy(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<ReviewRecord[]> {
  const nodes = await fetchUserPullRequestReviews(actor, window, repo, context);

  return nodes
    .filter((node) => !sameLogin(loginOf(node.pullRequest.author), actor))
    .map((node) => ({
      number: node.pullRequest.number,
      title: node.pullRequest.title,
      url: node.pullRequestReview?.url ?? node.pullRequest.url,
      state: node.pullRequestReview?.state ?? "COMMENTED",
      occurredAt: node.occurredAt,
      subjectAuthor: loginOf(node.pullRequest.author)
    }));
}

export function collectIssueActivities(
  issues: RecentIssueNode[],
  actor: string,
  window: TimeWindow,
  labelRules: LabelRules
): IssueActivities {
  const activities: IssueActivities = { opened: [], labeled: [], closed: [] };

  for (const issue of issues) {
    const subject = { number: issue.number, title: issue.title, url: issue.url };

    if (sameLogin(loginOf(issue.author), actor) && isWithinWindow(issue.createdAt, window)) {
      activities.opened.push({ ...subject, createdAt: issue.createdAt });
    }

    let labeled: IssueLabeledRecord | null = null;
    let closed: IssueClosedRecord | null = null;

    for (const event of timelineEvents(issue.timelineItems)) {
      if (!labeled && event.__typename === "LabeledEvent") {
        const label = event.label?.name;
        if (label && isResolutionLabel(label, labelRules) && performedBy(event, actor, window)) {
          labeled = { ...subject, label, labeledAt: event.createdAt };
        }
      } else if (!closed && event.__typename === "ClosedEvent" && performedBy(event, actor, window)) {
        const closer = toCloser(event.closer);
        if (closer.kind !== "pull_request") {
          closed = { ...subject, closedAt: event.createdAt, closer };
        }
      }

      if (labeled && closed) {
        break;
      }
    }

    if (labeled) {
      activities.labeled.push(labeled);
    }
    if (closed) {
      activities.closed.push(closed);
    }
  }

  return activities;
}

export async function getIssueActivitiesBy(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  labelRules: LabelRules,
  context: PaginatorContext
): Promise<IssueActivities> {
  const issues = await fetchRecentIssues(window, repo, context);
  return collectIssueActivities(issues, actor, window, labelRules);
}

export function collectPrActivities(
  pullRequests: RecentPullRequestNode[],
  actor: string,
  window: TimeWindow
): PrActivityRecord[] {
  const records: PrActivityRecord[] = [];

  for (const pr of pullRequests) {
    const subject = { number: pr.number, title: pr.title, url: pr.url, state: pr.state };

    if (sameLogin(loginOf(pr.author), actor) && isWithinWindow(pr.createdAt, window)) {
      records.push({ ...subject, action: "opened", occurredAt: pr.createdAt });
    }

    const events = timelineEvents(pr.timelineItems).filter((event) => performedBy(event, actor, window));
    const merge = events.find((event) => event.__typename === "MergedEvent");
    const close = events.find((event) => event.__typename === "ClosedEvent");

    if (merge?.createdAt) {
      records.push({ ...subject, action: "merged", occurredAt: merge.createdAt });
    } else if (close?.createdAt) {
      records.push({ ...subject, action: "closed", occurredAt: close.createdAt });
    }
  }

  return records;
}

export async function getPrActivitiesBy(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  context: PaginatorContext
): Promise<PrActivityRecord[]> {
  const pullRequests = await fetchRecentPullRequests(window, repo, context);
  return collectPrActivities(pullRequests, actor, window);
}
