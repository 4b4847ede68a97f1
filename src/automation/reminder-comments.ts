import { listStaleRequests } from "../analysis/classifier.js";
import { fanOutProjects } from "../concurrency.js";
import { daysBefore } from "../dates.js";
import type { NotificationLedger } from "../ledger/notification-ledger.js";
import {
  emptyCommentSummary,
  mergeCommentSummaries,
  type CommentSummary,
  type HostingPlatform,
} from "../types/index.js";
import * as log from "../log.js";

export interface ReminderCommentOptions {
  inactivityDays: number;
  frequencyDays: number;
  dryRun: boolean;
  ignoreBranches?: string[];
  now?: Date;
  random?: () => number;
}

/**
 * A request gets a reminder once it has been quiet for `inactivityDays`,
 * and again every `frequencyDays` after the previous bot comment.
 */
export function shouldComment(
  ledger: NotificationLedger,
  projectId: string,
  requestNumber: number,
  lastActivity: Date | null,
  inactivityDays: number,
  frequencyDays: number,
  now: Date = new Date(),
): boolean {
  if (!lastActivity) return false;
  if (lastActivity > daysBefore(now, inactivityDays)) return false;

  const previous = ledger.lastComment(projectId, requestNumber);
  if (!previous) return true;
  return previous.lastCommentedAt < daysBefore(now, frequencyDays);
}

/**
 * First reminder on a request starts at a random pool position; later ones
 * walk the pool in order and wrap around.
 */
export function nextCommentIndex(
  ledger: NotificationLedger,
  projectId: string,
  requestNumber: number,
  poolSize: number,
  random: () => number = Math.random,
): number {
  if (poolSize < 1) {
    throw new Error("Reminder comment pool is empty");
  }
  const previous = ledger.lastComment(projectId, requestNumber);
  if (!previous) {
    return Math.floor(random() * poolSize) % poolSize;
  }
  return (previous.commentIndex + 1) % poolSize;
}

export async function commentOnProject(
  platform: HostingPlatform,
  ledger: NotificationLedger,
  projectId: string,
  pool: readonly string[],
  options: ReminderCommentOptions,
): Promise<CommentSummary> {
  const now = options.now ?? new Date();
  const summary = emptyCommentSummary();
  const projectName = await platform.getProjectName(projectId);
  const candidates = await listStaleRequests(platform, projectId, projectName, options.inactivityDays, now, {
    ignoreBranches: options.ignoreBranches,
  });

  for (const request of candidates) {
    const ref = `${platform.requestPrefix}${request.number}`;
    if (
      !shouldComment(
        ledger,
        projectId,
        request.number,
        request.lastActivityAt,
        options.inactivityDays,
        options.frequencyDays,
        now,
      )
    ) {
      summary.skipped++;
      log.debug(`Skipping reminder on ${ref} in '${projectName}': commented recently`);
      continue;
    }

    const index = nextCommentIndex(ledger, projectId, request.number, pool.length, options.random);
    const body = pool[index];
    const commented = { projectId, projectName, number: request.number, title: request.title };

    if (options.dryRun) {
      log.dryRun(`Would post reminder comment to ${ref} in '${projectName}'`);
      log.debug(`Comment text: ${body.slice(0, 100)}`);
      summary.posted++;
      summary.commented.push(commented);
      continue;
    }

    try {
      await platform.postComment(projectId, request.number, body);
      ledger.recordComment(projectId, request.number, index, now);
      log.success(`Posted reminder comment to ${ref} in '${projectName}'`);
      summary.posted++;
      summary.commented.push(commented);
    } catch (err: unknown) {
      log.error(`Error posting comment to ${ref} in '${projectName}': ${log.errorMessage(err)}`);
      summary.failed++;
    }
  }

  return summary;
}

export async function runReminderComments(
  platform: HostingPlatform,
  ledger: NotificationLedger,
  projectIds: string[],
  maxWorkers: number,
  pool: readonly string[],
  options: ReminderCommentOptions,
): Promise<CommentSummary> {
  log.heading(`Reminder comments on stale ${platform.requestNoun}s`);
  const outcomes = await fanOutProjects(projectIds, maxWorkers, "Reminder comments", (projectId) =>
    commentOnProject(platform, ledger, projectId, pool, options),
  );
  return mergeCommentSummaries(outcomes.map((o) => o.result));
}
