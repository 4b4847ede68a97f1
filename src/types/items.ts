export type ItemType = "branch" | "merge_request";

export interface StaleBranch {
  kind: "branch";
  projectId: string;
  projectName: string;
  branchName: string;
  lastCommitAt: Date;
  authorName: string;
  authorEmail: string;
  committerEmail: string;
}

export interface StaleRequest {
  kind: "request";
  projectId: string;
  projectName: string;
  number: number;
  title: string;
  webUrl: string;
  sourceBranch: string;
  /** The source branch is in a fork, not in this project. */
  fromFork: boolean;
  assigneeEmail?: string;
  assigneeUsername?: string;
  authorEmail?: string;
  authorUsername?: string;
  authorName: string;
  lastActivityAt: Date;
}

export type StaleItem = StaleBranch | StaleRequest;

export interface RecipientItemSet {
  branches: StaleBranch[];
  mergeRequests: StaleRequest[];
}

/** Stale listing for one project, before any recipient is attached. */
export interface ProjectScan {
  projectId: string;
  projectName: string;
  staleRequests: StaleRequest[];
  staleBranches: StaleBranch[];
}

export interface ProjectAttribution {
  byRecipient: Map<string, RecipientItemSet>;
  dropped: StaleItem[];
}

export function itemType(item: StaleItem): ItemType {
  switch (item.kind) {
    case "branch": return "branch";
    case "request": return "merge_request";
  }
}

export function itemKey(item: StaleItem): string {
  switch (item.kind) {
    case "branch": return item.branchName;
    case "request": return String(item.number);
  }
}

export function itemBranch(item: StaleItem): string {
  switch (item.kind) {
    case "branch": return item.branchName;
    case "request": return item.sourceBranch;
  }
}

export function describeItem(item: StaleItem, requestPrefix = "!"): string {
  switch (item.kind) {
    case "branch": return `branch '${item.branchName}' in '${item.projectName}'`;
    case "request": return `request ${requestPrefix}${item.number} in '${item.projectName}'`;
  }
}

export function emptyItemSet(): RecipientItemSet {
  return { branches: [], mergeRequests: [] };
}

export function itemsOf(set: RecipientItemSet): StaleItem[] {
  return [...set.mergeRequests, ...set.branches];
}
