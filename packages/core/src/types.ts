export interface RepoRef {
  owner: string;
  repo: string;
}

export interface TimeWindow {
  from: Date;
  to: Date;
}

export interface ResolvedWindow extends TimeWindow {
  fromDate: string;
  toDate: string;
  timezone: string;
  days: number;
}

export interface LabelRules {
  resolutionPrefixes: string[];
  acknowledgmentPrefixes: string[];
}

export type Closer =
  | { kind: "pull_request"; number: number }
  | { kind: "commit" }
  | { kind: "manual" }
  | { kind: "unknown" };

export interface CommentRecord {
  number: number;
  title: string;
  url: string;
  publishedAt: string;
  onPullRequest: boolean;
  subjectAuthor: string | null;
}

export interface ReviewRecord {
  number: number;
  title: string;
  url: string;
  state: string;
  occurredAt: string;
  subjectAuthor: string | null;
}

export interface IssueOpenedRecord {
  number: number;
  title: string;
  url: string;
  createdAt: string;
}

export interface IssueLabeledRecord {
  number: number;
  title: string;
  url: string;
  label: string;
  labeledAt: string;
}

export interface IssueClosedRecord {
  number: number;
  title: string;
  url: string;
  closedAt: string;
  closer: Closer;
}

export type PrAction = "opened" | "merged" | "closed";
export type PrState = "OPEN" | "CLOSED" | "MERGED";

export interface PrActivityRecord {
  number: number;
  title: string;
  url: string;
  action: PrAction;
  occurredAt: string;
  state?: PrState;
}

export interface IssueActivities {
  opened: IssueOpenedRecord[];
  labeled: IssueLabeledRecord[];
  closed: IssueClosedRecord[];
}

export interface Contributions {
  comments: CommentRecord[];
  reviews: ReviewRecord[];
  issuesOpened: IssueOpenedRecord[];
  issuesLabeled: IssueLabeledRecord[];
  issuesClosed: IssueClosedRecord[];
  prsOpened: PrActivityRecord[];
  prsMerged: PrActivityRecord[];
  prsClosed: PrActivityRecord[];
}

/** Timeline facts of one issue or pull request, stripped of upstream wire shape. */
export interface LabelEventFact {
  actor: string | null;
  label: string;
  createdAt: string;
}

export interface CloseEventFact {
  actor: string | null;
  createdAt: string;
  closer: Closer;
}

export interface IssueFacts {
  commentAuthors: Array<string | null>;
  labelEvents: LabelEventFact[];
  closeEvents: CloseEventFact[];
}

export interface PrFacts {
  commentAuthors: Array<string | null>;
  reviewAuthors: Array<string | null>;
  mergeActors: Array<string | null>;
  closeActors: Array<string | null>;
}

export interface EngagementItem {
  number: number;
  title: string;
  url: string;
  createdAt: string;
  author: string | null;
}

export interface ManuallyClosedItem extends EngagementItem {
  closedAt: string | null;
  closedBy: string | null;
}

export interface PrTriggeredClosedItem extends EngagementItem {
  closedAt: string;
  prNumber: number;
}

export interface PrEngagementItem extends EngagementItem {
  state: PrState;
}

export interface IssueEngagement {
  totalIssues: number;
  teamEngaged: number;
  teamUnattended: number;
  engagementRatio: number;
  manuallyClosed: number;
  prTriggeredClosed: number;
  closedRatio: number;
  engagedIssues: EngagementItem[];
  unattendedIssues: EngagementItem[];
  manuallyClosedIssues: ManuallyClosedItem[];
  prTriggeredClosedIssues: PrTriggeredClosedItem[];
}

export interface PrEngagement {
  totalPrs: number;
  teamEngaged: number;
  teamUnattended: number;
  engagementRatio: number;
  merged: number;
  closed: number;
  finishRatio: number;
  engagedPrs: PrEngagementItem[];
  unattendedPrs: PrEngagementItem[];
  mergedPrs: PrEngagementItem[];
  closedPrs: PrEngagementItem[];
}

export interface TeamEngagement {
  issue: IssueEngagement;
  pr: PrEngagement;
}

export interface EngagementReport {
  team: TeamEngagement;
  contributors: TeamEngagement;
}

export interface Rosters {
  team: string[];
  contributors: string[];
}
