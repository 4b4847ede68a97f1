import type { ArchiveSummary, CommentSummary, NotificationSummary, RunSummary } from "../types/index.js";
import * as log from "../log.js";

export function buildNotificationLine(summary: NotificationSummary): string {
  return `${summary.emailsSent} sent, ${summary.emailsSkipped} skipped, ${summary.emailsFailed} failed`;
}

export function printNotificationSummary(summary: NotificationSummary, dryRun: boolean): void {
  log.heading(dryRun ? "Notification summary (dry run)" : "Notification summary");
  log.summary("Stale merge/pull requests", summary.totalStaleRequests);
  log.summary("Stale branches", summary.totalStaleBranches);
  log.summary("Emails", buildNotificationLine(summary));
  if (summary.itemsDropped > 0) {
    log.summary("Items without a recipient", summary.itemsDropped);
  }
  if (summary.recipients.length > 0) {
    log.summary("Recipients", summary.recipients.join(", "));
  }
}

export function printCommentSummary(summary: CommentSummary, requestPrefix: string): void {
  log.heading("Reminder comment summary");
  log.summary("Comments posted", summary.posted);
  log.summary("Skipped", summary.skipped);
  log.summary("Failed", summary.failed);
  for (const c of summary.commented) {
    log.info(`  ${c.projectName} ${requestPrefix}${c.number}: ${c.title}`);
  }
}

export function printArchiveSummary(summary: ArchiveSummary, requestPrefix: string): void {
  log.heading("Archive summary");
  log.summary("Branches archived", summary.branchesArchived);
  log.summary("Branches failed", summary.branchesFailed);
  log.summary("Merge/pull requests archived", summary.requestsArchived);
  log.summary("Merge/pull requests failed", summary.requestsFailed);
  log.summary("Opted out", summary.requestsOptedOut);
  if (summary.itemsSkipped > 0) {
    log.summary("Skipped (comments unreadable)", summary.itemsSkipped);
  }

  for (const item of summary.archivedItems) {
    const ref = item.number !== undefined ? ` ${requestPrefix}${item.number}` : "";
    log.success(`${item.project}${ref} '${item.branch}' → ${item.archivePath}`);
  }
  for (const item of summary.failedItems) {
    const ref = item.number !== undefined ? ` ${requestPrefix}${item.number}` : "";
    log.error(`${item.project}${ref} '${item.branch}': ${item.error}`);
  }
}

export function printRunSummary(summary: RunSummary, options: { dryRun: boolean; requestPrefix: string }): void {
  printNotificationSummary(summary.notifications, options.dryRun);
  if (summary.comments) printCommentSummary(summary.comments, options.requestPrefix);
  if (summary.archive) printArchiveSummary(summary.archive, options.requestPrefix);
  console.log();
}
