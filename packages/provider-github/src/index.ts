export type { GraphqlTransport, GraphqlVariables, GithubGraphqlClientOptions } from "./client.js";
export { GithubGraphqlClient, readGraphqlPayload } from "./client.js";
export type { ProviderLogger } from "./logger.js";
export { silentLogger } from "./logger.js";
export type { PageDirection, QueryDocument } from "./queries.js";
export {
  REPO_RECENT_ISSUES,
  REPO_RECENT_PULL_REQUESTS,
  TEAM_ISSUE_SEARCH,
  TEAM_PR_SEARCH,
  TIMELINE_LIMIT,
  USER_ISSUE_COMMENTS,
  USER_PR_REVIEWS
} from "./queries.js";
export type {
  RecentIssueNode,
  RecentPullRequestNode,
  SearchIssueNode,
  SearchPullRequestNode,
  UserIssueCommentNode,
  UserReviewNode
} from "./schemas.js";
export type { PaginateOptions } from "./paginate.js";
export { paginate } from "./paginate.js";
export type { PaginatorContext } from "./paginators.js";
export {
  buildSearchQuery,
  fetchRecentIssues,
  fetchRecentPullRequests,
  fetchUserIssueComments,
  fetchUserPullRequestReviews,
  searchIssuesCreated,
  searchPullRequestsCreated
} from "./paginators.js";
export {
  collectIssueActivities,
  collectPrActivities,
  getCommentsBy,
  getIssueActivitiesBy,
  getPrActivitiesBy,
  getReviewsBy
} from "./activities.js";
export type { ContributionOptions } from "./contributions.js";
export { getContributionsBy, getContributionsByDaysBack } from "./contributions.js";
export type { EngagementOptions } from "./engagement.js";
export {
  getEngagementReport,
  getTeamEngagement,
  getTeamIssueEngagement,
  getTeamPrEngagement,
  summarizeIssueEngagement,
  summarizePrEngagement
} from "./engagement.js";
