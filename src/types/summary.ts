export interface NotificationSummary {
  totalStaleBranches: number;
  totalStaleRequests: number;
  emailsSent: number;
  emailsSkipped: number;
  emailsFailed: number;
  itemsDropped: number;
  recipients: string[];
}

export interface CommentedRequest {
  projectId: string;
  projectName: string;
  number: number;
  title: string;
}

export interface CommentSummary {
  posted: number;
  skipped: number;
  failed: number;
  commented: CommentedRequest[];
}

export type ArchivedItemType = "branch" | "merge_request";

export interface ArchivedItem {
  type: ArchivedItemType;
  project: string;
  branch: string;
  number?: number;
  archivePath: string;
}

export interface FailedItem {
  type: ArchivedItemType;
  project: string;
  branch: string;
  number?: number;
  error: string;
}

export interface ArchiveSummary {
  branchesArchived: number;
  branchesFailed: number;
  requestsArchived: number;
  requestsFailed: number;
  requestsOptedOut: number;
  itemsSkipped: number;
  archivedItems: ArchivedItem[];
  failedItems: FailedItem[];
}

export interface RunSummary {
  notifications: NotificationSummary;
  comments?: CommentSummary;
  archive?: ArchiveSummary;
}

export function emptyNotificationSummary(): NotificationSummary {
  return {
    totalStaleBranches: 0,
    totalStaleRequests: 0,
    emailsSent: 0,
    emailsSkipped: 0,
    emailsFailed: 0,
    itemsDropped: 0,
    recipients: [],
  };
}

export function emptyCommentSummary(): CommentSummary {
  return { posted: 0, skipped: 0, failed: 0, commented: [] };
}

export function emptyArchiveSummary(): ArchiveSummary {
  return {
    branchesArchived: 0,
    branchesFailed: 0,
    requestsArchived: 0,
    requestsFailed: 0,
    requestsOptedOut: 0,
    itemsSkipped: 0,
    archivedItems: [],
    failedItems: [],
  };
}

export function mergeCommentSummaries(parts: CommentSummary[]): CommentSummary {
  const merged = emptyCommentSummary();
  for (const part of parts) {
    merged.posted += part.posted;
    merged.skipped += part.skipped;
    merged.failed += part.failed;
    merged.commented.push(...part.commented);
  }
  return merged;
}

export function mergeArchiveSummaries(parts: ArchiveSummary[]): ArchiveSummary {
  const merged = emptyArchiveSummary();
  for (const part of parts) {
    merged.branchesArchived += part.branchesArchived;
    merged.branchesFailed += part.branchesFailed;
    merged.requestsArchived += part.requestsArchived;
    merged.requestsFailed += part.requestsFailed;
    merged.requestsOptedOut += part.requestsOptedOut;
    merged.itemsSkipped += part.itemsSkipped;
    merged.archivedItems.push(...part.archivedItems);
    merged.failedItems.push(...part.failedItems);
  }
  return merged;
}
