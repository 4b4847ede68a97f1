import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { formatFileStamp } from "../../dates.js";
import type {
  BranchArchiveResult,
  HostingPlatform,
  RequestArchiveResult,
  StaleBranch,
  StaleRequest,
} from "../../types/index.js";
import * as log from "../../log.js";

export interface ExecutorOptions {
  archiveFolder: string;
  dryRun: boolean;
  now?: Date;
}

export function closingComment(requestNoun: string): string {
  return (
    `🤖 This ${requestNoun} has been automatically closed by the repository maintenance bot ` +
    "due to prolonged inactivity. The source branch has been archived and will be deleted. " +
    `If this work is still needed, please create a new branch and ${requestNoun}.`
  );
}

export function sanitizeName(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, "_");
}

const ARCHIVE_EXTENSION = ".tar.gz";
const MAX_NAME_ATTEMPTS = 100;

function archiveStem(projectName: string, branchName: string, at: Date): string {
  return `${sanitizeName(projectName)}_${sanitizeName(branchName)}_${formatFileStamp(at)}`;
}

/** `{project}_{branch}_{YYYYMMDD_HHMMSS}.tar.gz`, UTC. */
export function buildArchiveFilename(projectName: string, branchName: string, at: Date): string {
  return archiveStem(projectName, branchName, at) + ARCHIVE_EXTENSION;
}

function dryRunArchivePath(folder: string, projectName: string, branchName: string): string {
  return join(folder, `${sanitizeName(projectName)}_${sanitizeName(branchName)}_<timestamp>${ARCHIVE_EXTENSION}`);
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Create a new archive file, never replacing one. Branches whose sanitised
 * names collide get `_1`, `_2`, ... appended to the stem.
 */
function writeNewArchive(folder: string, stem: string, data: Uint8Array): string {
  mkdirSync(folder, { recursive: true });
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const archivePath = join(folder, `${attempt === 0 ? stem : `${stem}_${attempt}`}${ARCHIVE_EXTENSION}`);
    try {
      writeFileSync(archivePath, data, { flag: "wx" });
      return archivePath;
    } catch (err: unknown) {
      if (!isAlreadyExists(err)) throw err;
      log.debug(`Archive ${archivePath} already exists, trying the next name`);
    }
  }
  throw new Error(`No free archive file name for '${stem}' after ${MAX_NAME_ATTEMPTS} attempts`);
}

/** Download the branch tree and write it under the archive folder. Throws on any failure. */
export async function exportBranch(
  platform: HostingPlatform,
  projectId: string,
  projectName: string,
  branchName: string,
  archiveFolder: string,
  at: Date = new Date(),
): Promise<string> {
  log.info(`Exporting branch '${branchName}' from '${projectName}' to ${archiveFolder}`);

  const data = await platform.downloadBranchArchive(projectId, branchName);
  const archivePath = writeNewArchive(archiveFolder, archiveStem(projectName, branchName, at), data);

  log.success(`Exported branch '${branchName}' to ${archivePath}`);
  return archivePath;
}

async function deletePhase(platform: HostingPlatform, item: StaleBranch | StaleRequest, branchName: string): Promise<boolean> {
  try {
    await platform.deleteBranch(item.projectId, branchName);
    log.success(`Deleted branch '${branchName}' from '${item.projectName}'`);
    return true;
  } catch (err: unknown) {
    log.error(`Error deleting branch '${branchName}' from '${item.projectName}': ${log.errorMessage(err)}`);
    return false;
  }
}

/** Export, then delete. Nothing is deleted unless the export succeeded. */
export async function archiveBranch(
  platform: HostingPlatform,
  branch: StaleBranch,
  options: ExecutorOptions,
): Promise<BranchArchiveResult> {
  const result: BranchArchiveResult = {
    kind: "branch",
    success: false,
    projectName: branch.projectName,
    branchName: branch.branchName,
    archived: false,
    deleted: false,
    archivePath: null,
    error: null,
  };

  if (options.dryRun) {
    log.dryRun(`Would export branch '${branch.branchName}' from '${branch.projectName}' to ${options.archiveFolder}`);
    log.dryRun(`Would delete branch '${branch.branchName}' from '${branch.projectName}'`);
    return {
      ...result,
      success: true,
      archived: true,
      deleted: true,
      archivePath: dryRunArchivePath(options.archiveFolder, branch.projectName, branch.branchName),
    };
  }

  try {
    result.archivePath = await exportBranch(
      platform,
      branch.projectId,
      branch.projectName,
      branch.branchName,
      options.archiveFolder,
      options.now,
    );
    result.archived = true;
  } catch (err: unknown) {
    log.error(`Failed to export branch '${branch.branchName}', skipping deletion: ${log.errorMessage(err)}`);
    result.error = `Failed to export branch - aborting deletion for safety: ${log.errorMessage(err)}`;
    return result;
  }

  result.deleted = await deletePhase(platform, branch, branch.branchName);
  if (result.deleted) {
    result.success = true;
  } else {
    result.error = "Branch was archived but could not be deleted";
  }
  return result;
}

/**
 * Export, close (comment first), delete. A failed export stops everything;
 * a failed close still lets the delete go ahead since the backup exists.
 */
export async function archiveRequest(
  platform: HostingPlatform,
  request: StaleRequest,
  options: ExecutorOptions,
): Promise<RequestArchiveResult> {
  const ref = `${platform.requestPrefix}${request.number}`;
  const noun = platform.requestNoun;
  const result: RequestArchiveResult = {
    kind: "request",
    success: false,
    projectName: request.projectName,
    branchName: request.sourceBranch,
    number: request.number,
    archived: false,
    closed: false,
    deleted: false,
    archivePath: null,
    error: null,
  };

  if (options.dryRun) {
    log.dryRun(
      `Would export branch '${request.sourceBranch}' from '${request.projectName}' to ${options.archiveFolder}`,
    );
    log.dryRun(`Would close ${noun} ${ref} in '${request.projectName}'`);
    log.dryRun(`Would delete branch '${request.sourceBranch}' from '${request.projectName}'`);
    return {
      ...result,
      success: true,
      archived: true,
      closed: true,
      deleted: true,
      archivePath: dryRunArchivePath(options.archiveFolder, request.projectName, request.sourceBranch),
    };
  }

  try {
    result.archivePath = await exportBranch(
      platform,
      request.projectId,
      request.projectName,
      request.sourceBranch,
      options.archiveFolder,
      options.now,
    );
    result.archived = true;
  } catch (err: unknown) {
    log.error(
      `Failed to export branch '${request.sourceBranch}' for ${ref}, skipping close and deletion: ${log.errorMessage(err)}`,
    );
    result.error = `Failed to export branch - aborting ${noun} close and deletion for safety: ${log.errorMessage(err)}`;
    return result;
  }

  try {
    await platform.postComment(request.projectId, request.number, closingComment(noun));
    await platform.closeRequest(request.projectId, request.number);
    result.closed = true;
    log.success(`Closed ${noun} ${ref} in '${request.projectName}'`);
  } catch (err: unknown) {
    log.error(`Error closing ${noun} ${ref} in '${request.projectName}': ${log.errorMessage(err)}`);
    result.error = `Branch was archived but ${noun} could not be closed`;
  }

  result.deleted = await deletePhase(platform, request, request.sourceBranch);
  if (result.deleted) {
    result.success = result.closed;
  } else if (result.error) {
    result.error += "; Branch could not be deleted";
  } else {
    result.error = `Branch was archived and ${noun} closed but branch could not be deleted`;
  }
  return result;
}
