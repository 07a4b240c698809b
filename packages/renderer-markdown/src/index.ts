import {
  repoFullName,
  type Contributions,
  type EngagementReport,
  type IssueEngagement,
  type PrEngagement,
  type RepoRef,
  type ResolvedWindow
} from "@maintainer-pulse/core";

export interface MarkdownRendererOptions {
  includeLinks?: boolean;
  includeMetrics?: boolean;
}

export interface ContributionsReportMeta {
  user: string;
  repository: RepoRef;
  window: ResolvedWindow;
}

export interface EngagementReportMeta {
  repository: RepoRef;
  window: ResolvedWindow;
}

interface ReportLine {
  title: string;
  url: string;
  number: number;
  detail?: string;
}

function formatLine(line: ReportLine, withLinks: boolean): string {
  const detail = line.detail ? ` (${line.detail})` : "";
  const linkSuffix = withLinks && line.url ? ` - ${line.url}` : "";
  return `- #${line.number} ${line.title}${detail}${linkSuffix}`;
}

function formatSection(title: string, lines: ReportLine[], withLinks: boolean): string[] {
  if (lines.length === 0) {
    return [`## ${title}`, "- (none)"];
  }
  return [`## ${title}`, ...lines.map((line) => formatLine(line, withLinks))];
}

function windowLine(window: ResolvedWindow): string {
  return `Window: ${window.fromDate} to ${window.toDate} (${window.timezone}, ${window.days} days)`;
}

export function renderContributionsReport(
  contributions: Contributions,
  meta: ContributionsReportMeta,
  options: MarkdownRendererOptions = {}
): string {
  const includeLinks = options.includeLinks ?? true;
  const includeMetrics = options.includeMetrics ?? true;

  const issueComments = contributions.comments.filter((comment) => !comment.onPullRequest);
  const prComments = contributions.comments.filter((comment) => comment.onPullRequest);
  const triage = issueComments.length + contributions.issuesLabeled.length + contributions.issuesClosed.length;
  const reviews =
    prComments.length + contributions.reviews.length + contributions.prsMerged.length + contributions.prsClosed.length;

  const lines: string[] = [];
  lines.push(`# Contributions by ${meta.user} in ${repoFullName(meta.repository)}`);
  lines.push(windowLine(meta.window));
  lines.push("");

  if (includeMetrics) {
    lines.push(
      `Stats: issues_opened=${contributions.issuesOpened.length}, prs_opened=${contributions.prsOpened.length}, issue_triage=${triage}, code_reviews=${reviews}`
    );
    lines.push("");
  }

  const sections: Array<[string, ReportLine[]]> = [
    ["Issues Opened", contributions.issuesOpened],
    ["Pull Requests Opened", contributions.prsOpened],
    ["Issue Comments", issueComments],
    [
      "Issues Labeled",
      contributions.issuesLabeled.map((record) => ({ ...record, detail: record.label }))
    ],
    ["Issues Closed", contributions.issuesClosed],
    ["Pull Request Comments", prComments],
    ["Reviews", contributions.reviews.map((record) => ({ ...record, detail: record.state }))],
    ["Pull Requests Merged", contributions.prsMerged],
    ["Pull Requests Closed", contributions.prsClosed]
  ];

  sections.forEach(([title, items], index) => {
    if (index > 0) {
      lines.push("");
    }
    lines.push(...formatSection(title, items, includeLinks));
  });

  return lines.join("\n");
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function issueRow(label: string, engagement: IssueEngagement): string {
  return `| ${label} | ${engagement.totalIssues} | ${engagement.teamEngaged} | ${engagement.teamUnattended} | ${percent(engagement.engagementRatio)} | ${engagement.manuallyClosed} | ${engagement.prTriggeredClosed} | ${percent(engagement.closedRatio)} |`;
}

function prRow(label: string, engagement: PrEngagement): string {
  return `| ${label} | ${engagement.totalPrs} | ${engagement.teamEngaged} | ${engagement.teamUnattended} | ${percent(engagement.engagementRatio)} | ${engagement.merged} | ${engagement.closed} | ${percent(engagement.finishRatio)} |`;
}

export function renderEngagementReport(
  report: EngagementReport,
  meta: EngagementReportMeta,
  options: MarkdownRendererOptions = {}
): string {
  const includeLinks = options.includeLinks ?? true;
  const { issue } = report.team;

  const lines: string[] = [];
  lines.push(`# Team engagement in ${repoFullName(meta.repository)}`);
  lines.push(windowLine(meta.window));
  lines.push("");
  lines.push("## Issues");
  lines.push("| Roster | Total | Engaged | Unattended | Engagement | Manually closed | Closed by PR | Closed |");
  lines.push("| --- | --- | --- | --- | --- | --- | --- | --- |");
  lines.push(issueRow("Team", report.team.issue));
  lines.push(issueRow("Contributors", report.contributors.issue));
  lines.push("");
  lines.push("## Pull Requests");
  lines.push("| Roster | Total | Engaged | Unattended | Engagement | Merged | Closed | Finished |");
  lines.push("| --- | --- | --- | --- | --- | --- | --- | --- |");
  lines.push(prRow("Team", report.team.pr));
  lines.push(prRow("Contributors", report.contributors.pr));
  lines.push("");
  lines.push(
    ...formatSection(
      "Unattended Issues",
      issue.unattendedIssues.map((item) => ({ ...item, detail: item.author ? `by ${item.author}` : "" })),
      includeLinks
    )
  );
  lines.push("");
  lines.push(
    ...formatSection(
      "Manually Closed Issues",
      issue.manuallyClosedIssues.map((item) => ({ ...item, detail: `closed by ${item.closedBy ?? "unknown"}` })),
      includeLinks
    )
  );
  lines.push("");
  lines.push(
    ...formatSection(
      "Issues Closed by Pull Requests",
      issue.prTriggeredClosedIssues.map((item) => ({ ...item, detail: `via #${item.prNumber}` })),
      includeLinks
    )
  );
  lines.push("");
  lines.push(
    ...formatSection(
      "Unattended Pull Requests",
      report.team.pr.unattendedPrs.map((item) => ({ ...item, detail: item.state })),
      includeLinks
    )
  );

  return lines.join("\n");
}
