import type { Contributions, LabelRules, PrActivityRecord, RepoRef, TimeWindow } from "@maintainer-pulse/core";
import {
  DEFAULT_LABEL_RULES,
  MERGE_GRACE_MS,
  assertWindow,
  isMergeTriggeredClose,
  windowFromDaysBack
} from "@maintainer-pulse/core";
import { getCommentsBy, getIssueActivitiesBy, getPrActivitiesBy, getReviewsBy } from "./activities.js";
import type { PaginatorContext } from "./paginators.js";

export interface ContributionOptions extends PaginatorContext {
  labelRules?: LabelRules;
  mergeGraceMs?: number;
}

function byAction(records: PrActivityRecord[], action: PrActivityRecord["action"]): PrActivityRecord[] {
  return records.filter((record) => record.action === action);
}

/**
 * Collects everything `actor` did in `repo` during `window`.
 *
 * The four extractors run concurrently and the first failure rejects the whole
 * call. Issue closes that carry no closer reference are dropped when they land
 * within the grace interval after one of the actor's own merges.
 */
export async function getContributionsBy(
  actor: string,
  window: TimeWindow,
  repo: RepoRef,
  options: ContributionOptions
): Promise<Contributions> {
  assertWindow(window);
  const labelRules = options.labelRules ?? DEFAULT_LABEL_RULES;
  const graceMs = options.mergeGraceMs ?? MERGE_GRACE_MS;

  const [comments, reviews, issueActivities, prActivities] = await Promise.all([
    getCommentsBy(actor, window, repo, options),
    getReviewsBy(actor, window, repo, options),
    getIssueActivitiesBy(actor, window, repo, labelRules, options),
    getPrActivitiesBy(actor, window, repo, options)
  ]);

  const prsMerged = byAction(prActivities, "merged");
  const mergeTimes = prsMerged.map((record) => record.occurredAt);
  const issuesClosed = issueActivities.closed.filter(
    (record) =>
      !(record.closer.kind === "unknown" && isMergeTriggeredClose(record.closedAt, mergeTimes, graceMs))
  );

  return {
    comments,
    reviews,
    issuesOpened: issueActivities.opened,
    issuesLabeled: issueActivities.labeled,
    issuesClosed,
    prsOpened: byAction(prActivities, "opened"),
    prsMerged,
    prsClosed: byAction(prActivities, "closed")
  };
}

export async function getContributionsByDaysBack(
  actor: string,
  days: number,
  repo: RepoRef,
  options: ContributionOptions,
  now: Date = new Date()
): Promise<Contributions> {
  return getContributionsBy(actor, windowFromDaysBack(days, now), repo, options);
}
