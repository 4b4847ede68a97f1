import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import yaml from "js-yaml";

export type TestConfigOptions = Record<string, unknown>;

function defaultConfig(dir: string): TestConfigOptions {
  return {
    platform: "gitlab",
    gitlab: { url: "https://gitlab.example.com", private_token: "test-secret" },
    smtp: { host: "smtp.example.com", port: 25, from_email: "bot@example.com", use_tls: false },
    projects: ["42"],
    fallback_email: "ops@example.com",
    database_path: join(dir, "state", "notification_history.db"),
    archive_folder: join(dir, "archive"),
  };
}

export interface TestDir {
  /** Absolute path to the temp directory */
  dir: string;
  /** Absolute path to the config file */
  configPath: string;
  databasePath: string;
  archiveFolder: string;
  /** Build an absolute path inside the temp dir */
  path: (relative: string) => string;
  /** Cleanup the temp directory */
  cleanup: () => void;
}

/**
 * Creates a temp directory with a YAML config whose ledger and archive
 * folder live inside it.
 */
export function createTestDir(configOverrides: TestConfigOptions = {}): TestDir {
  const dir = mkdtempSync(join(tmpdir(), "stale-branch-e2e-"));
  const config = { ...defaultConfig(dir), ...configOverrides };
  const configPath = join(dir, "config.yaml");
  writeFileSync(configPath, yaml.dump(config), "utf-8");

  return {
    dir,
    configPath,
    databasePath: join(dir, "state", "notification_history.db"),
    archiveFolder: join(dir, "archive"),
    path: (relative: string) => join(dir, relative),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
