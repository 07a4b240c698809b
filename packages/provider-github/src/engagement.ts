import type {
  EngagementItem,
  EngagementReport,
  IssueEngagement,
  LabelRules,
  ManuallyClosedItem,
  PrEngagement,
  PrEngagementItem,
  PrTriggeredClosedItem,
  RepoRef,
  Rosters,
  TeamEngagement,
  TimeWindow
} from "@maintainer-pulse/core";
import {
  DEFAULT_LABEL_RULES,
  assertWindow,
  attributeClose,
  classifyIssueEngagement,
  classifyPrEngagement,
  createRoster,
  ratio
} from "@maintainer-pulse/core";
import type { Roster } from "@maintainer-pulse/core";
import type { PaginatorContext } from "./paginators.js";
import { searchIssuesCreated, searchPullRequestsCreated } from "./paginators.js";
import type { SearchIssueNode, SearchPullRequestNode } from "./schemas.js";
import { loginOf, toIssueFacts, toPrFacts } from "./schemas.js";

export interface EngagementOptions extends PaginatorContext {
  labelRules?: LabelRules;
}

function toEngagementItem(node: SearchIssueNode | SearchPullRequestNode): EngagementItem {
  return {
    number: node.number,
    title: node.title,
    url: node.url,
    createdAt: node.createdAt,
    author: loginOf(node.author)
  };
}

export function summarizeIssueEngagement(
  issues: SearchIssueNode[],
  roster: Roster,
  labelRules: LabelRules = DEFAULT_LABEL_RULES
): IssueEngagement {
  const engagedIssues: EngagementItem[] = [];
  const unattendedIssues: EngagementItem[] = [];
  const manuallyClosedIssues: ManuallyClosedItem[] = [];
  const prTriggeredClosedIssues: PrTriggeredClosedItem[] = [];

  for (const issue of issues) {
    const item = toEngagementItem(issue);
    const facts = toIssueFacts(issue);

    if (classifyIssueEngagement(facts, roster, labelRules)) {
      engagedIssues.push(item);
    } else {
      unattendedIssues.push(item);
    }

    if (issue.state !== "CLOSED") {
      continue;
    }

    const attribution = attributeClose(facts.closeEvents);
    if (attribution.kind === "pr_triggered") {
      prTriggeredClosedIssues.push({ ...item, closedAt: attribution.closedAt, prNumber: attribution.prNumber });
    } else {
      manuallyClosedIssues.push({ ...item, closedAt: attribution.closedAt, closedBy: attribution.closedBy });
    }
  }

  const total = issues.length;
  return {
    totalIssues: total,
    teamEngaged: engagedIssues.length,
    teamUnattended: unattendedIssues.length,
    engagementRatio: ratio(engagedIssues.length, total),
    manuallyClosed: manuallyClosedIssues.length,
    prTriggeredClosed: prTriggeredClosedIssues.length,
    closedRatio: ratio(manuallyClosedIssues.length + prTriggeredClosedIssues.length, total),
    engagedIssues,
    unattendedIssues,
    manuallyClosedIssues,
    prTriggeredClosedIssues
  };
}

export function summarizePrEngagement(pullRequests: SearchPullRequestNode[], roster: Roster): PrEngagement {
  const engagedPrs: PrEngagementItem[] = [];
  const unattendedPrs: PrEngagementItem[] = [];
  const mergedPrs: PrEngagementItem[] = [];
  const closedPrs: PrEngagementItem[] = [];

  for (const pr of pullRequests) {
    const item: PrEngagementItem = { ...toEngagementItem(pr), state: pr.state };

    if (classifyPrEngagement(toPrFacts(pr), roster)) {
      engagedPrs.push(item);
    } else {
      unattendedPrs.push(item);
    }

    // Final state decides, whoever merged or closed it.
    if (pr.state === "MERGED") {
      mergedPrs.push(item);
    } else if (pr.state === "CLOSED") {
      closedPrs.push(item);
    }
  }

  const total = pullRequests.length;
  return {
    totalPrs: total,
    teamEngaged: engagedPrs.length,
    teamUnattended: unattendedPrs.length,
    engagementRatio: ratio(engagedPrs.length, total),
    merged: mergedPrs.length,
    closed: closedPrs.length,
    finishRatio: ratio(mergedPrs.length + closedPrs.length, total),
    engagedPrs,
    unattendedPrs,
    mergedPrs,
    closedPrs
  };
}

export async function getTeamIssueEngagement(
  window: TimeWindow,
  roster: string[],
  repo: RepoRef,
  options: EngagementOptions
): Promise<IssueEngagement> {
  assertWindow(window);
  const issues = await searchIssuesCreated(window, repo, options);
  return summarizeIssueEngagement(issues, createRoster(roster), options.labelRules);
}

export async function getTeamPrEngagement(
  window: TimeWindow,
  roster: string[],
  repo: RepoRef,
  options: EngagementOptions
): Promise<PrEngagement> {
  assertWindow(window);
  const pullRequests = await searchPullRequestsCreated(window, repo, options);
  return summarizePrEngagement(pullRequests, createRoster(roster));
}

export async function getTeamEngagement(
  window: TimeWindow,
  roster: string[],
  repo: RepoRef,
  options: EngagementOptions
): Promise<TeamEngagement> {
  const [issue, pr] = await Promise.all([
    getTeamIssueEngagement(window, roster, repo, options),
    getTeamPrEngagement(window, roster, repo, options)
  ]);
  return { issue, pr };
}

/** Classifies one fetch of issues and pull requests against both the team and the contributor roster. */
export async function getEngagementReport(
  window: TimeWindow,
  rosters: Rosters,
  repo: RepoRef,
  options: EngagementOptions
): Promise<EngagementReport> {
  assertWindow(window);
  const [issues, pullRequests] = await Promise.all([
    searchIssuesCreated(window, repo, options),
    searchPullRequestsCreated(window, repo, options)
  ]);

  const summarize = (logins: string[]): TeamEngagement => {
    const roster = createRoster(logins);
    return {
      issue: summarizeIssueEngagement(issues, roster, options.labelRules),
      pr: summarizePrEngagement(pullRequests, roster)
    };
  };

  return {
    team: summarize(rosters.team),
    contributors: summarize(rosters.contributors)
  };
}
