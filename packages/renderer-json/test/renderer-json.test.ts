import { describe, expect, it } from "vitest";
import type { Contributions, EngagementReport, ResolvedWindow, TeamEngagement } from "@maintainer-pulse/core";
import { formatErrorResponse, formatMetricsResponse, formatTeamEngagementResponse } from "../src/index.js";

const REPO = { owner: "acme", repo: "widgets" };
const FETCHED_AT = new Date("2026-02-08T12:00:00.250Z");

const WINDOW: ResolvedWindow = {
  from: new Date("2026-02-01T08:00:00Z"),
  to: new Date("2026-02-08T07:59:59Z"),
  fromDate: "2026-02-01",
  toDate: "2026-02-07",
  timezone: "America/Los_Angeles",
  days: 7
};

function emptyContributions(): Contributions {
  return {
    comments: [],
    reviews: [],
    issuesOpened: [],
    issuesLabeled: [],
    issuesClosed: [],
    prsOpened: [],
    prsMerged: [],
    prsClosed: []
  };
}

function emptyTeam(): TeamEngagement {
  return {
    issue: {
      totalIssues: 0,
      teamEngaged: 0,
      teamUnattended: 0,
      engagementRatio: 0,
      manuallyClosed: 0,
      prTriggeredClosed: 0,
      closedRatio: 0,
      engagedIssues: [],
      unattendedIssues: [],
      manuallyClosedIssues: [],
      prTriggeredClosedIssues: []
    },
    pr: {
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
    }
  };
}

describe("formatMetricsResponse", () => {
  it("splits comments between triage and code review and counts every action", () => {
    const contributions: Contributions = {
      ...emptyContributions(),
      comments: [
        {
          number: 3,
          title: "Crash on start",
          url: "https://github.com/acme/widgets/issues/3#issuecomment-1",
          publishedAt: "2026-02-02T10:00:00Z",
          onPullRequest: false,
          subjectAuthor: "bob"
        },
        {
          number: 4,
          title: "Faster startup",
          url: "https://github.com/acme/widgets/pull/4#issuecomment-2",
          publishedAt: "2026-02-03T10:00:00Z",
          onPullRequest: true,
          subjectAuthor: "bob"
        }
      ],
      reviews: [
        {
          number: 4,
          title: "Faster startup",
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
      prsMerged: [
        {
          number: 4,
          title: "Faster startup",
          url: "https://github.com/acme/widgets/pull/4",
          action: "merged",
          occurredAt: "2026-02-03T12:00:00Z"
        }
      ]
    };

    const response = formatMetricsResponse(contributions, {
      user: "alice",
      repository: REPO,
      window: WINDOW,
      fetchedAt: FETCHED_AT
    });

    expect(response.meta).toEqual({
      user: "alice",
      repository: "acme/widgets",
      period: { days: 7, start: "2026-02-01T08:00:00Z", end: "2026-02-08T07:59:59Z" },
      fetched_at: "2026-02-08T12:00:00Z"
    });
    expect(response.summary).toEqual({
      total_actions: 6,
      by_category: { issues_opened: 1, prs_opened: 0, issue_triage: 2, code_reviews: 3 }
    });
    expect(response.data.issue_triage.comments).toEqual([
      {
        number: 3,
        title: "Crash on start",
        url: "https://github.com/acme/widgets/issues/3#issuecomment-1",
        timestamp: "2026-02-02T10:00:00Z"
      }
    ]);
    expect(response.data.code_reviews.comments.map((entry) => entry.number)).toEqual([4]);
    expect(response.data.code_reviews.reviews[0]?.state).toBe("APPROVED");
    expect(response.data.code_reviews.merged).toEqual([
      {
        number: 4,
        title: "Faster startup",
        url: "https://github.com/acme/widgets/pull/4",
        action: "merged",
        timestamp: "2026-02-03T12:00:00Z"
      }
    ]);
    expect(response.data.issues_opened).toEqual([
      { number: 5, title: "Docs typo", url: "https://github.com/acme/widgets/issues/5", created_at: "2026-02-04T00:00:00Z" }
    ]);
  });

  it("adds the calendar range for date range requests", () => {
    const response = formatMetricsResponse(emptyContributions(), {
      user: "alice",
      repository: REPO,
      window: WINDOW,
      dateRange: true,
      fetchedAt: FETCHED_AT
    });

    expect(response.meta.period).toEqual({
      days: 7,
      start: "2026-02-01T08:00:00Z",
      end: "2026-02-08T07:59:59Z",
      from_date: "2026-02-01",
      to_date: "2026-02-07",
      timezone: "America/Los_Angeles"
    });
    expect(response.summary.total_actions).toBe(0);
  });
});

describe("formatTeamEngagementResponse", () => {
  it("renames fields to snake case for both rosters", () => {
    const team = emptyTeam();
    const report: EngagementReport = {
      team: {
        issue: {
          ...team.issue,
          totalIssues: 2,
          manuallyClosed: 1,
          prTriggeredClosed: 1,
          closedRatio: 1,
          manuallyClosedIssues: [
            {
              number: 1,
              title: "Old bug",
              url: "https://github.com/acme/widgets/issues/1",
              createdAt: "2026-02-01T09:00:00Z",
              author: "bob",
              closedAt: "2026-02-02T09:00:00Z",
              closedBy: "alice"
            }
          ],
          prTriggeredClosedIssues: [
            {
              number: 2,
              title: "Other bug",
              url: "https://github.com/acme/widgets/issues/2",
              createdAt: "2026-02-01T10:00:00Z",
              author: null,
              closedAt: "2026-02-03T09:00:00Z",
              prNumber: 40
            }
          ]
        },
        pr: {
          ...team.pr,
          totalPrs: 1,
          teamEngaged: 1,
          engagementRatio: 1,
          engagedPrs: [
            {
              number: 40,
              title: "Fix bug",
              url: "https://github.com/acme/widgets/pull/40",
              createdAt: "2026-02-02T00:00:00Z",
              author: "carol",
              state: "MERGED"
            }
          ]
        }
      },
      contributors: emptyTeam()
    };

    const response = formatTeamEngagementResponse(report, {
      repository: REPO,
      window: WINDOW,
      fetchedAt: FETCHED_AT
    });

    expect(response.meta).toEqual({
      repository: "acme/widgets",
      from_date: "2026-02-01",
      to_date: "2026-02-07",
      timezone: "America/Los_Angeles",
      fetched_at: "2026-02-08T12:00:00Z"
    });
    expect(response.team.issue.total_issues).toBe(2);
    expect(response.team.issue.closed_ratio).toBe(1);
    expect(response.team.issue.manually_closed_issues).toEqual([
      {
        number: 1,
        title: "Old bug",
        url: "https://github.com/acme/widgets/issues/1",
        created_at: "2026-02-01T09:00:00Z",
        author: "bob",
        closed_at: "2026-02-02T09:00:00Z",
        closed_by: "alice"
      }
    ]);
    expect(response.team.issue.pr_triggered_closed_issues[0]?.pr_number).toBe(40);
    expect(response.team.pr.engaged_prs[0]).toEqual({
      number: 40,
      title: "Fix bug",
      url: "https://github.com/acme/widgets/pull/40",
      created_at: "2026-02-02T00:00:00Z",
      author: "carol",
      state: "MERGED"
    });
    expect(response.contributors.pr.finish_ratio).toBe(0);
    expect(response.contributors.issue.engaged_issues).toEqual([]);
  });
});

describe("formatErrorResponse", () => {
  it("wraps the code and message with a timestamp", () => {
    expect(formatErrorResponse("MISSING_PARAMETER", "user is required", FETCHED_AT)).toEqual({
      error: { code: "MISSING_PARAMETER", message: "user is required", timestamp: "2026-02-08T12:00:00Z" }
    });
  });
});
