import { fanOutProjects } from "../../concurrency.js";
import type { NotificationLedger } from "../../ledger/notification-ledger.js";
import {
  emptyArchiveSummary,
  mergeArchiveSummaries,
  type ArchiveResult,
  type ArchiveSummary,
  type HostingPlatform,
  type ProjectScan,
} from "../../types/index.js";
import * as log from "../../log.js";
import { hasOptOutMarker, isArchiveEnabledFor, isEligibleForArchive } from "./eligibility.js";
import { archiveBranch, archiveRequest } from "./executor.js";

export { DEFAULT_OPT_OUT_MARKER, normalizeOptOutMarker } from "./eligibility.js";

export interface ArchivePassOptions {
  cleanupWeeks: number;
  optOutMarker: string;
  archiveFolder: string;
  dryRun: boolean;
  /** Project ids allowed to archive; undefined means all scanned projects. */
  autoArchiveProjects?: string[];
  now?: Date;
}

function recordResult(summary: ArchiveSummary, result: ArchiveResult): void {
  const type = result.kind === "branch" ? "branch" : "merge_request";
  const number = result.kind === "request" ? result.number : undefined;

  if (result.success && result.archivePath) {
    summary.archivedItems.push({
      type,
      project: result.projectName,
      branch: result.branchName,
      number,
      archivePath: result.archivePath,
    });
    if (result.kind === "branch") summary.branchesArchived++;
    else summary.requestsArchived++;
    return;
  }

  summary.failedItems.push({
    type,
    project: result.projectName,
    branch: result.branchName,
    number,
    error: result.error ?? "Unknown error",
  });
  if (result.kind === "branch") summary.branchesFailed++;
  else summary.requestsFailed++;
}

/**
 * Archive the eligible items of one scanned project, requests before bare
 * branches. Requests carrying the opt-out marker are left alone, and so are
 * fork requests: their source branch is not in this project.
 */
export async function archiveProject(
  platform: HostingPlatform,
  ledger: NotificationLedger,
  scan: ProjectScan,
  options: ArchivePassOptions,
): Promise<ArchiveSummary> {
  const now = options.now ?? new Date();
  const summary = emptyArchiveSummary();
  const executorOptions = { archiveFolder: options.archiveFolder, dryRun: options.dryRun, now };

  for (const request of scan.staleRequests) {
    if (!isEligibleForArchive(ledger, request, options.cleanupWeeks, now)) continue;
    const ref = `${platform.requestPrefix}${request.number}`;

    if (request.fromFork) {
      log.info(`Skipping ${ref} in '${scan.projectName}': source branch '${request.sourceBranch}' is in a fork`);
      summary.itemsSkipped++;
      continue;
    }

    let optedOut: boolean;
    try {
      optedOut = await hasOptOutMarker(platform, request.projectId, request.number, options.optOutMarker);
    } catch (err: unknown) {
      log.warn(`Could not read comments on ${ref} in '${scan.projectName}', skipping archive: ${log.errorMessage(err)}`);
      summary.itemsSkipped++;
      continue;
    }
    if (optedOut) {
      log.info(`Skipping ${ref} in '${scan.projectName}': opted out with '${options.optOutMarker}'`);
      summary.requestsOptedOut++;
      continue;
    }

    log.info(`Archiving ${platform.requestNoun} ${ref} in '${scan.projectName}'`);
    recordResult(summary, await archiveRequest(platform, request, executorOptions));
  }

  for (const branch of scan.staleBranches) {
    if (!isEligibleForArchive(ledger, branch, options.cleanupWeeks, now)) continue;
    log.info(`Archiving branch '${branch.branchName}' in '${scan.projectName}'`);
    recordResult(summary, await archiveBranch(platform, branch, executorOptions));
  }

  return summary;
}

export async function runArchivePass(
  platform: HostingPlatform,
  ledger: NotificationLedger,
  scans: ProjectScan[],
  maxWorkers: number,
  options: ArchivePassOptions,
): Promise<ArchiveSummary> {
  log.heading("Automatic archiving");
  const byProject = new Map<string, ProjectScan>();
  for (const scan of scans) {
    if (isArchiveEnabledFor(scan.projectId, options.autoArchiveProjects)) {
      byProject.set(scan.projectId, scan);
    } else {
      log.debug(`Auto-archive is not enabled for project ${scan.projectId}`);
    }
  }

  const outcomes = await fanOutProjects([...byProject.keys()], maxWorkers, "Archiving", async (projectId) => {
    const scan = byProject.get(projectId);
    if (!scan) return emptyArchiveSummary();
    return archiveProject(platform, ledger, scan, options);
  });
  return mergeArchiveSummaries(outcomes.map((o) => o.result));
}
