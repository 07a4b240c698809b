export type PageDirection = "forward" | "backward";

export interface QueryDocument {
  readonly name: string;
  readonly direction: PageDirection;
  readonly text: string;
}

// Timelines come back oldest first; `last` keeps the most recent events when an item has more.
export const TIMELINE_LIMIT = 100;

function defineDocument(name: string, direction: PageDirection, text: string): QueryDocument {
  return Object.freeze({ name, direction, text: text.trim() });
}

// `issueComments` only pages backward: `last`/`before` walks from the newest comment.
export const USER_ISSUE_COMMENTS = defineDocument(
  "UserIssueComments",
  "backward",
  /* GraphQL */ `
query UserIssueComments($login: String!, $pageSize: Int!, $before: String) {
  user(login: $login) {
    issueComments(last: $pageSize, before: $before) {
      pageInfo {
        hasPreviousPage
        startCursor
      }
      nodes {
        url
        createdAt
        publishedAt
        issue {
          number
          title
          author { login }
          repository { nameWithOwner }
        }
        pullRequest { number }
      }
    }
  }
}
`
);

export const USER_PR_REVIEWS = defineDocument(
  "UserPullRequestReviews",
  "forward",
  /* GraphQL */ `
query UserPullRequestReviews(
  $login: String!
  $from: DateTime!
  $to: DateTime!
  $pageSize: Int!
  $after: String
) {
  user(login: $login) {
    contributionsCollection(from: $from, to: $to) {
      pullRequestReviewContributions(first: $pageSize, after: $after) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          occurredAt
          pullRequest {
            number
            title
            url
            author { login }
          }
          pullRequestReview {
            url
            state
          }
          repository { nameWithOwner }
        }
      }
    }
  }
}
`
);

export const REPO_RECENT_ISSUES = defineDocument(
  "RepositoryRecentIssues",
  "forward",
  /* GraphQL */ `
query RepositoryRecentIssues(
  $owner: String!
  $name: String!
  $since: DateTime!
  $pageSize: Int!
  $after: String
) {
  repository(owner: $owner, name: $name) {
    issues(
      first: $pageSize
      after: $after
      orderBy: { field: UPDATED_AT, direction: DESC }
      filterBy: { since: $since }
    ) {
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        number
        title
        url
        createdAt
        updatedAt
        author { login }
        timelineItems(last: ${TIMELINE_LIMIT}, itemTypes: [LABELED_EVENT, CLOSED_EVENT]) {
          nodes {
            __typename
            ... on LabeledEvent {
              createdAt
              actor { login }
              label { name }
            }
            ... on ClosedEvent {
              createdAt
              actor { login }
              closer {
                __typename
                ... on PullRequest { number }
              }
            }
          }
        }
      }
    }
  }
}
`
);

export const REPO_RECENT_PULL_REQUESTS = defineDocument(
  "RepositoryRecentPullRequests",
  "forward",
  /* GraphQL */ `
query RepositoryRecentPullRequests(
  $owner: String!
  $name: String!
  $pageSize: Int!
  $after: String
) {
  repository(owner: $owner, name: $name) {
    pullRequests(
      first: $pageSize
      after: $after
      orderBy: { field: UPDATED_AT, direction: DESC }
      states: [OPEN, CLOSED, MERGED]
    ) {
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        number
        title
        url
        state
        createdAt
        updatedAt
        author { login }
        timelineItems(last: ${TIMELINE_LIMIT}, itemTypes: [MERGED_EVENT, CLOSED_EVENT]) {
          nodes {
            __typename
            ... on MergedEvent {
              createdAt
              actor { login }
            }
            ... on ClosedEvent {
              createdAt
              actor { login }
            }
          }
        }
      }
    }
  }
}
`
);

export const TEAM_ISSUE_SEARCH = defineDocument(
  "TeamIssueSearch",
  "forward",
  /* GraphQL */ `
query TeamIssueSearch($searchQuery: String!, $pageSize: Int!, $after: String) {
  search(query: $searchQuery, type: ISSUE, first: $pageSize, after: $after) {
    pageInfo {
      hasNextPage
      endCursor
    }
    nodes {
      __typename
      ... on Issue {
        number
        title
        url
        state
        createdAt
        author { login }
        comments(first: 100) {
          nodes {
            author { login }
          }
        }
        timelineItems(last: ${TIMELINE_LIMIT}, itemTypes: [LABELED_EVENT, CLOSED_EVENT]) {
          nodes {
            __typename
            ... on LabeledEvent {
              createdAt
              actor { login }
              label { name }
            }
            ... on ClosedEvent {
              createdAt
              actor { login }
              closer {
                __typename
                ... on PullRequest { number }
              }
            }
          }
        }
      }
    }
  }
}
`
);

export const TEAM_PR_SEARCH = defineDocument(
  "TeamPullRequestSearch",
  "forward",
  /* GraphQL */ `
query TeamPullRequestSearch($searchQuery: String!, $pageSize: Int!, $after: String) {
  search(query: $searchQuery, type: ISSUE, first: $pageSize, after: $after) {
    pageInfo {
      hasNextPage
      endCursor
    }
    nodes {
      __typename
      ... on PullRequest {
        number
        title
        url
        state
        createdAt
        author { login }
        comments(first: 100) {
          nodes {
            author { login }
          }
        }
        reviews(first: 100) {
          nodes {
            author { login }
          }
        }
        timelineItems(last: ${TIMELINE_LIMIT}, itemTypes: [MERGED_EVENT, CLOSED_EVENT]) {
          nodes {
            __typename
            ... on MergedEvent {
              createdAt
              actor { login }
            }
            ... on ClosedEvent {
              createdAt
              actor { login }
            }
          }
        }
      }
    }
  }
}
`
);
