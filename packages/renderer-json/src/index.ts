import {
  repoFullName,
  toIsoSeconds,
  type CommentRecord,
  type Contributions,
  type EngagementItem,
  type EngagementReport,
  type IssueEngagement,
  type ManuallyClosedItem,
  type PrActivityRecord,
  type PrEngagement,
  type PrEngagementItem,
  type PrTriggeredClosedItem,
  type RepoRef,
  type ResolvedWindow,
  type TeamEngagement
} from "@maintainer-pulse/core";

export interface ActivityEntry {
  number: number;
  title: string;
  url: string;
  timestamp: string;
}

export interface IssueOpenedEntry {
  number: number;
  title: string;
  url: string;
  created_at: string;
}

export interface PrActionEntry extends ActivityEntry {
  action: PrActivityRecord["action"];
}

export interface LabeledEntry extends ActivityEntry {
  label: string;
}

export interface ReviewEntry extends ActivityEntry {
  state: string;
}

export interface MetricsPeriod {
  days: number;
  start: string;
  end: string;
  from_date?: string;
  to_date?: string;
  timezone?: string;
}

export interface MetricsResponse {
  meta: {
    user: string;
    repository: string;
    period: MetricsPeriod;
    fetched_at: string;
  };
  summary: {
    total_actions: number;
    by_category: {
      issues_opened: number;
      prs_opened: number;
      issue_triage: number;
      code_reviews: number;
    };
  };
  data: {
    issues_opened: IssueOpenedEntry[];
    prs_opened: PrActionEntry[];
    issue_triage: {
      comments: ActivityEntry[];
      labeled: LabeledEntry[];
      closed: ActivityEntry[];
    };
    code_reviews: {
      comments: ActivityEntry[];
      reviews: ReviewEntry[];
      merged: PrActionEntry[];
      closed: PrActionEntry[];
    };
  };
}

export interface MetricsResponseOptions {
  user: string;
  repository: RepoRef;
  window: ResolvedWindow;
  /** Include the calendar range and timezone in `meta.period`. */
  dateRange?: boolean;
  fetchedAt?: Date;
}

function commentEntry(comment: CommentRecord): ActivityEntry {
  return { number: comment.number, title: comment.title, url: comment.url, timestamp: comment.publishedAt };
}

function prActionEntry(record: PrActivityRecord): PrActionEntry {
  return {
    number: record.number,
    title: record.title,
    url: record.url,
    action: record.action,
    timestamp: record.occurredAt
  };
}

function formatPeriod(window: ResolvedWindow, dateRange: boolean): MetricsPeriod {
  const period: MetricsPeriod = {
    days: window.days,
    start: toIsoSeconds(window.from),
    end: toIsoSeconds(window.to)
  };
  if (!dateRange) {
    return period;
  }
  return { ...period, from_date: window.fromDate, to_date: window.toDate, timezone: window.timezone };
}

export function formatMetricsResponse(
  contributions: Contributions,
  options: MetricsResponseOptions
): MetricsResponse {
  const issueTriage = {
    comments: contributions.comments.filter((comment) => !comment.onPullRequest).map(commentEntry),
    labeled: contributions.issuesLabeled.map((record) => ({
      number: record.number,
      title: record.title,
      url: record.url,
      label: record.label,
      timestamp: record.labeledAt
    })),
    closed: contributions.issuesClosed.map((record) => ({
      number: record.number,
      title: record.title,
      url: record.url,
      timestamp: record.closedAt
    }))
  };
  const codeReviews = {
    comments: contributions.comments.filter((comment) => comment.onPullRequest).map(commentEntry),
    reviews: contributions.reviews.map((record) => ({
      number: record.number,
      title: record.title,
      url: record.url,
      state: record.state,
      timestamp: record.occurredAt
    })),
    merged: contributions.prsMerged.map(prActionEntry),
    closed: contributions.prsClosed.map(prActionEntry)
  };
  const issuesOpened = contributions.issuesOpened.map((record) => ({
    number: record.number,
    title: record.title,
    url: record.url,
    created_at: record.createdAt
  }));
  const prsOpened = contributions.prsOpened.map(prActionEntry);

  const triageCount = issueTriage.comments.length + issueTriage.labeled.length + issueTriage.closed.length;
  const reviewCount =
    codeReviews.comments.length + codeReviews.reviews.length + codeReviews.merged.length + codeReviews.closed.length;

  return {
    meta: {
      user: options.user,
      repository: repoFullName(options.repository),
      period: formatPeriod(options.window, options.dateRange ?? false),
      fetched_at: toIsoSeconds(options.fetchedAt ?? new Date())
    },
    summary: {
      total_actions: issuesOpened.length + prsOpened.length + triageCount + reviewCount,
      by_category: {
        issues_opened: issuesOpened.length,
        prs_opened: prsOpened.length,
        issue_triage: triageCount,
        code_reviews: reviewCount
      }
    },
    data: {
      issues_opened: issuesOpened,
      prs_opened: prsOpened,
      issue_triage: issueTriage,
      code_reviews: codeReviews
    }
  };
}

export interface EngagementItemEntry {
  number: number;
  title: string;
  url: string;
  created_at: string;
  author: string | null;
}

export interface ManuallyClosedEntry extends EngagementItemEntry {
  closed_at: string | null;
  closed_by: string | null;
}

export interface PrTriggeredClosedEntry extends EngagementItemEntry {
  closed_at: string;
  pr_number: number;
}

export interface PrEngagementEntry extends EngagementItemEntry {
  state: PrEngagementItem["state"];
}

export interface IssueEngagementResponse {
  total_issues: number;
  team_engaged: number;
  team_unattended: number;
  engagement_ratio: number;
  manually_closed: number;
  pr_triggered_closed: number;
  closed_ratio: number;
  engaged_issues: EngagementItemEntry[];
  unattended_issues: EngagementItemEntry[];
  manually_closed_issues: ManuallyClosedEntry[];
  pr_triggered_closed_issues: PrTriggeredClosedEntry[];
}

export interface PrEngagementResponse {
  total_prs: number;
  team_engaged: number;
  team_unattended: number;
  engagement_ratio: number;
  merged: number;
  closed: number;
  finish_ratio: number;
  engaged_prs: PrEngagementEntry[];
  unattended_prs: PrEngagementEntry[];
  merged_prs: PrEngagementEntry[];
  closed_prs: PrEngagementEntry[];
}

export interface TeamEngagementSection {
  issue: IssueEngagementResponse;
  pr: PrEngagementResponse;
}

export interface TeamEngagementResponse {
  meta: {
    repository: string;
    from_date: string;
    to_date: string;
    timezone: string;
    fetched_at: string;
  };
  team: TeamEngagementSection;
  contributors: TeamEngagementSection;
}

export interface TeamEngagementResponseOptions {
  repository: RepoRef;
  window: ResolvedWindow;
  fetchedAt?: Date;
}

function itemEntry(item: EngagementItem): EngagementItemEntry {
  return {
    number: item.number,
    title: item.title,
    url: item.url,
    created_at: item.createdAt,
    author: item.author
  };
}

function manuallyClosedEntry(item: ManuallyClosedItem): ManuallyClosedEntry {
  return { ...itemEntry(item), closed_at: item.closedAt, closed_by: item.closedBy };
}

function prTriggeredClosedEntry(item: PrTriggeredClosedItem): PrTriggeredClosedEntry {
  return { ...itemEntry(item), closed_at: item.closedAt, pr_number: item.prNumber };
}

function prEntry(item: PrEngagementItem): PrEngagementEntry {
  return { ...itemEntry(item), state: item.state };
}

export function formatIssueEngagement(engagement: IssueEngagement): IssueEngagementResponse {
  return {
    total_issues: engagement.totalIssues,
    team_engaged: engagement.teamEngaged,
    team_unattended: engagement.teamUnattended,
    engagement_ratio: engagement.engagementRatio,
    manually_closed: engagement.manuallyClosed,
    pr_triggered_closed: engagement.prTriggeredClosed,
    closed_ratio: engagement.closedRatio,
    engaged_issues: engagement.engagedIssues.map(itemEntry),
    unattended_issues: engagement.unattendedIssues.map(itemEntry),
    manually_closed_issues: engagement.manuallyClosedIssues.map(manuallyClosedEntry),
    pr_triggered_closed_issues: engagement.prTriggeredClosedIssues.map(prTriggeredClosedEntry)
  };
}

export function formatPrEngagement(engagement: PrEngagement): PrEngagementResponse {
  return {
    total_prs: engagement.totalPrs,
    team_engaged: engagement.teamEngaged,
    team_unattended: engagement.teamUnattended,
    engagement_ratio: engagement.engagementRatio,
    merged: engagement.merged,
    closed: engagement.closed,
    finish_ratio: engagement.finishRatio,
    engaged_prs: engagement.engagedPrs.map(prEntry),
    unattended_prs: engagement.unattendedPrs.map(prEntry),
    merged_prs: engagement.mergedPrs.map(prEntry),
    closed_prs: engagement.closedPrs.map(prEntry)
  };
}

function formatSection(engagement: TeamEngagement): TeamEngagementSection {
  return { issue: formatIssueEngagement(engagement.issue), pr: formatPrEngagement(engagement.pr) };
}

export function formatTeamEngagementResponse(
  report: EngagementReport,
  options: TeamEngagementResponseOptions
): TeamEngagementResponse {
  return {
    meta: {
      repository: repoFullName(options.repository),
      from_date: options.window.fromDate,
      to_date: options.window.toDate,
      timezone: options.window.timezone,
      fetched_at: toIsoSeconds(options.fetchedAt ?? new Date())
    },
    team: formatSection(report.team),
    contributors: formatSection(report.contributors)
  };
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    timestamp: string;
  };
}

export function formatErrorResponse(code: string, message: string, now: Date = new Date()): ErrorResponse {
  return { error: { code, message, timestamp: toIsoSeconds(now) } };
}
