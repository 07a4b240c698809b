import type { RepoRef } from "./types.js";

export function parseRepoRef(repoRef: string): RepoRef {
  const trimmed = repoRef.trim();
  const parts = trimmed.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`Invalid repo reference: ${repoRef}. Expected owner/repo.`);
  }

  return { owner: parts[0], repo: parts[1] };
}

export function repoFullName(ref: RepoRef): string {
  return `${ref.owner}/${ref.repo}`;
}

export function sameRepository(nameWithOwner: string | null | undefined, ref: RepoRef): boolean {
  if (!nameWithOwner) {
    return false;
  }
  return nameWithOwner.toLowerCase() === repoFullName(ref).toLowerCase();
}
