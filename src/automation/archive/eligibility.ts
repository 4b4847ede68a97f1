import { daysBefore } from "../../dates.js";
import type { NotificationLedger } from "../../ledger/notification-ledger.js";
import { itemKey, itemType, type HostingPlatform, type RawComment, type StaleItem } from "../../types/index.js";

export const DEFAULT_OPT_OUT_MARKER = "#skip-auto-archive";
export const OPT_OUT_SCAN_LIMIT = 20;

export function normalizeOptOutMarker(raw: string | null | undefined): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : DEFAULT_OPT_OUT_MARKER;
}

/**
 * The archive clock starts at the first notification to anyone, so an
 * item that was never announced is never archived.
 */
export function archiveClockStart(ledger: NotificationLedger, item: StaleItem): Date | null {
  return ledger.earliestFirstFound(itemType(item), item.projectId, itemKey(item));
}

export function isEligibleForArchive(
  ledger: NotificationLedger,
  item: StaleItem,
  cleanupWeeks: number,
  now: Date = new Date(),
): boolean {
  const firstNotified = archiveClockStart(ledger, item);
  if (!firstNotified) return false;
  return firstNotified < daysBefore(now, cleanupWeeks * 7);
}

export function commentsContainMarker(comments: readonly RawComment[], marker: string): boolean {
  const needle = marker.toLowerCase();
  return comments.some((c) => c.body.toLowerCase().includes(needle));
}

/** Scans the newest comments of a request. Lookup errors propagate. */
export async function hasOptOutMarker(
  platform: HostingPlatform,
  projectId: string,
  requestNumber: number,
  marker: string,
): Promise<boolean> {
  const comments = await platform.listRecentComments(projectId, requestNumber, OPT_OUT_SCAN_LIMIT);
  return commentsContainMarker(comments.slice(0, OPT_OUT_SCAN_LIMIT), marker);
}

/** An absent whitelist means every scanned project. */
export function isArchiveEnabledFor(projectId: string, autoArchiveProjects: readonly string[] | undefined): boolean {
  return autoArchiveProjects === undefined || autoArchiveProjects.includes(projectId);
}
