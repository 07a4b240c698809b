import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import type {
  Contributions,
  EngagementItem,
  EngagementReport,
  IssueEngagement,
  PrEngagement,
  ResolvedWindow
} from "@maintainer-pulse/core";
import { renderContributionsReport, renderEngagementReport } from "../src/index.js";

const REPO = { owner: "acme", repo: "widgets" };

const WINDOW: ResolvedWindow = {
  from: new Date("2026-02-01T00:00:00Z"),
  to: new Date("2026-02-07T23:59:59Z"),
  fromDate: "2026-02-01",
  toDate: "2026-02-07",
  timezone: "UTC",
  days: 7
};

function normalizeEol(input: string): string {
  return input.replace(/\r\n/g, "\n").trimEnd();
}

async function readGoldenFile(name: string): Promise<string> {
  const url = new URL(`./fixtures/${name}`, import.meta.url);
  const raw = await readFile(url, "utf-8");
  return normalizeEol(raw);
}

function issueItem(number: number, title: string, author: string | null): EngagementItem {
  return {
    number,
    title,
    url: `https://github.com/acme/widgets/issues/${number}`,
    createdAt: "2026-02-02T00:00:00Z",
    author
  };
}

function emptyPrEngagement(): PrEngagement {
  return {
    totalPrs: 0,
    teamEngaged: 0,
    teamUnattended: 0,
    engagementRatio: 0,
    merged: 0,
    closed: 0,
    finishRatio: 0,
    engagedPrs: [],
    unattendedPrs: [],
    mergedPrs: [],
    closedPrs: []
  };
}

describe("renderContributionsReport golden tests", () => {
  it("renders every section with links and metrics", async () => {
    const contributions: Contributions = {
      comments: [
        {
          number: 3,
          title: "Crash on start",
          url: "https://github.com/acme/widgets/issues/3#issuecomment-1",
          publishedAt: "2026-02-02T10:00:00Z",
          onPullRequest: false,
          subjectAuthor: "bob"
        }
      ],
      reviews: [
        {
          number: 4,
          title: "Faster builds",
          url: "https://github.com/acme/widgets/pull/4#pullrequestreview-9",
          state: "APPROVED",
          occurredAt: "2026-02-03T11:00:00Z",
          subjectAuthor: "bob"
        }
      ],
      issuesOpened: [
        { number: 5, title: "Docs typo", url: "https://github.com/acme/widgets/issues/5", createdAt: "2026-02-04T00:00:00Z" }
      ],
      issuesLabeled: [
        {
          number: 3,
          title: "Crash on start",
          url: "https://github.com/acme/widgets/issues/3",
          label: "Resolution-Fixed",
          labeledAt: "2026-02-02T11:00:00Z"
        }
      ],
      issuesClosed: [],
      prsOpened: [
        {
          number: 6,
          title: "Faster startup",
          url: "https://github.com/acme/widgets/pull/6",
          action: "opened",
          occurredAt: "2026-02-05T00:00:00Z"
        }
      ],
      prsMerged: [
        {
          number: 4,
          title: "Faster builds",
          url: "https://github.com/acme/widgets/pull/4",
          action: "merged",
          occurredAt: "2026-02-03T12:00:00Z"
        }
      ],
      prsClosed: []
    };

    const rendered = normalizeEol(
      renderContributionsReport(contributions, { user: "alice", repository: REPO, window: WINDOW })
    );
    const golden = await readGoldenFile("contributions-with-links.md");
    expect(rendered).toBe(golden);
  });

  it("omits the stats line when metrics are disabled", () => {
    const rendered = renderContributionsReport(
      {
        comments: [],
        reviews: [],
        issuesOpened: [],
        issuesLabeled: [],
        issuesClosed: [],
        prsOpened: [],
        prsMerged: [],
        prsClosed: []
      },
      { user: "alice", repository: REPO, window: WINDOW },
      { includeMetrics: false }
    );

    expect(rendered.split("\n").slice(0, 5)).toEqual([
      "# Contributions by alice in acme/widgets",
      "Window: 2026-02-01 to 2026-02-07 (UTC, 7 days)",
      "",
      "## Issues Opened",
      "- (none)"
    ]);
  });
});

describe("renderEngagementReport golden tests", () => {
  it("renders roster tables and close breakdowns without links", async () => {
    const teamIssues: IssueEngagement = {
      totalIssues: 3,
      teamEngaged: 2,
      teamUnattended: 1,
      engagementRatio: 2 / 3,
      manuallyClosed: 1,
      prTriggeredClosed: 1,
      closedRatio: 2 / 3,
      engagedIssues: [issueItem(1, "Old bug", "bob"), issueItem(2, "Other bug", "carol")],
      unattendedIssues: [issueItem(3, "Flaky test", "dave")],
      manuallyClosedIssues: [{ ...issueItem(1, "Old bug", "bob"), closedAt: null, closedBy: null }],
      prTriggeredClosedIssues: [
        { ...issueItem(2, "Other bug", "carol"), closedAt: "2026-02-03T00:00:00Z", prNumber: 40 }
      ]
    };
    const report: EngagementReport = {
      team: { issue: teamIssues, pr: emptyPrEngagement() },
      contributors: {
        issue: {
          ...teamIssues,
          teamEngaged: 0,
          teamUnattended: 3,
          engagementRatio: 0,
          engagedIssues: [],
          unattendedIssues: [
            issueItem(1, "Old bug", "bob"),
            issueItem(2, "Other bug", "carol"),
            issueItem(3, "Flaky test", "dave")
          ]
        },
        pr: emptyPrEngagement()
      }
    };

    const rendered = normalizeEol(
      renderEngagementReport(report, { repository: REPO, window: WINDOW }, { includeLinks: false })
    );
    const golden = await readGoldenFile("engagement-no-links.md");
    expect(rendered).toBe(golden);
  });
});
