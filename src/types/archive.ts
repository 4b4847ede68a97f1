interface ArchiveResultBase {
  success: boolean;
  projectName: string;
  branchName: string;
  archived: boolean;
  deleted: boolean;
  archivePath: string | null;
  error: string | null;
}

export interface BranchArchiveResult extends ArchiveResultBase {
  kind: "branch";
}

export interface RequestArchiveResult extends ArchiveResultBase {
  kind: "request";
  number: number;
  closed: boolean;
}

export type ArchiveResult = BranchArchiveResult | RequestArchiveResult;
