import type { IssueFacts, LabelRules, PrFacts } from "../types.js";

export const DEFAULT_LABEL_RULES: LabelRules = {
  resolutionPrefixes: ["Resolution-", "WG-"],
  acknowledgmentPrefixes: ["WG-"]
};

export interface Roster {
  readonly size: number;
  has(login: string | null | undefined): boolean;
}

function normalizeLogin(login: string): string {
  return login.trim().toLowerCase();
}

export function sameLogin(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) {
    return false;
  }
  return normalizeLogin(a) === normalizeLogin(b);
}

export function createRoster(logins: Iterable<string>): Roster {
  const members = new Set<string>();
  for (const login of logins) {
    const normalized = normalizeLogin(login);
    if (normalized) {
      members.add(normalized);
    }
  }

  return {
    size: members.size,
    has(login) {
      if (!login) {
        return false;
      }
      return members.has(normalizeLogin(login));
    }
  };
}

function hasPrefix(name: string, prefixes: string[]): boolean {
  return prefixes.some((prefix) => prefix.length > 0 && name.startsWith(prefix));
}

export function isResolutionLabel(name: string, rules: LabelRules = DEFAULT_LABEL_RULES): boolean {
  return hasPrefix(name, rules.resolutionPrefixes);
}

export function isAcknowledgmentLabel(name: string, rules: LabelRules = DEFAULT_LABEL_RULES): boolean {
  return hasPrefix(name, rules.acknowledgmentPrefixes);
}

/**
 * An issue counts as engaged when a roster member commented on it or closed it,
 * when anyone applied an acknowledgment label, or when a roster member applied a
 * resolution label.
 */
export function classifyIssueEngagement(
  facts: IssueFacts,
  roster: Roster,
  rules: LabelRules = DEFAULT_LABEL_RULES
): boolean {
  if (facts.commentAuthors.some((author) => roster.has(author))) {
    return true;
  }

  for (const event of facts.labelEvents) {
    if (isAcknowledgmentLabel(event.label, rules)) {
      return true;
    }
    if (isResolutionLabel(event.label, rules) && roster.has(event.actor)) {
      return true;
    }
  }

  return facts.closeEvents.some((event) => roster.has(event.actor));
}

export function classifyPrEngagement(facts: PrFacts, roster: Roster): boolean {
  return [facts.commentAuthors, facts.reviewAuthors, facts.mergeActors, facts.closeActors].some(
    (logins) => logins.some((login) => roster.has(login))
  );
}

export function ratio(part: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return part / total;
}
