import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { DEFAULT_OPT_OUT_MARKER, normalizeOptOutMarker } from "./automation/archive/index.js";
import { DEFAULT_MAX_WORKERS, MAX_WORKERS, MIN_WORKERS } from "./concurrency.js";
import type { PlatformKind } from "./types/index.js";
import * as log from "./log.js";

export const DEFAULT_CONFIG_FILE = "config.yaml";

/** Raised for any problem with the configuration file, before any project is scanned. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface GitLabSettings {
  kind: "gitlab";
  url: string;
  token: string;
}

export interface GitHubSettings {
  kind: "github";
  token: string;
  apiUrl?: string;
}

export type PlatformSettings = GitLabSettings | GitHubSettings;

export interface SmtpSettings {
  host: string;
  port: number;
  fromEmail: string;
  useTls: boolean;
  username?: string;
  password?: string;
}

export interface AppConfig {
  platform: PlatformSettings;
  smtp: SmtpSettings;
  projects: string[];
  staleDays: number;
  cleanupWeeks: number;
  notificationFrequencyDays: number;
  mrCommentInactivityDays: number;
  mrCommentFrequencyDays: number;
  maxWorkers: number;
  /** undefined means every configured project */
  autoArchiveProjects?: string[];
  optOutMarker: string;
  fallbackEmail: string | null;
  databasePath: string;
  archiveFolder: string;
  enableAutoArchive: boolean;
  enableMrComments: boolean;
  mrCommentsFile?: string;
  emailGreetingsFile?: string;
  ignoreBranches: string[];
}

const projectId = z.union([z.string().trim().min(1), z.number().int()]).transform(String);
const days = z.number().int().nonnegative();

const ConfigFileSchema = z.object({
  platform: z.enum(["gitlab", "github"]).default("gitlab"),
  gitlab: z
    .object({
      url: z.string().url(),
      private_token: z.string().optional(),
    })
    .optional(),
  github: z
    .object({
      token: z.string().optional(),
      api_url: z.string().url().optional(),
    })
    .optional(),
  smtp: z.object({
    host: z.string().min(1),
    port: z.number().int().positive(),
    from_email: z.string().email(),
    use_tls: z.boolean().default(true),
    username: z.string().optional(),
    password: z.string().optional(),
  }),
  projects: z.array(projectId).min(1, "at least one project is required"),
  stale_days: days.default(30),
  cleanup_weeks: days.default(4),
  notification_frequency_days: days.default(7),
  mr_comment_inactivity_days: days.default(14),
  mr_comment_frequency_days: days.default(7),
  max_workers: z.unknown().optional(),
  auto_archive_projects: z.array(projectId).optional(),
  prevent_auto_archive_comment: z.string().nullish(),
  fallback_email: z.string().nullish(),
  database_path: z.string().min(1).default("./notification_history.db"),
  archive_folder: z.string().min(1).default("./archived_branches"),
  enable_auto_archive: z.boolean().default(false),
  enable_mr_comments: z.boolean().default(false),
  mr_comments_file: z.string().min(1).optional(),
  email_greetings_file: z.string().min(1).optional(),
  ignore_branches: z.array(z.string().min(1)).default([]),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Non-integers fall back to the default; integers outside [1, 32] are
 * clamped. Both cases log a warning.
 */
export function resolveMaxWorkers(raw: unknown): number {
  if (raw === undefined || raw === null) return DEFAULT_MAX_WORKERS;

  const parsed = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  if (typeof parsed !== "number" || !Number.isInteger(parsed)) {
    log.warn(
      `Invalid 'max_workers' value ${JSON.stringify(raw)} in config; falling back to default ${DEFAULT_MAX_WORKERS}`,
    );
    return DEFAULT_MAX_WORKERS;
  }

  if (parsed < MIN_WORKERS || parsed > MAX_WORKERS) {
    const clamped = Math.min(Math.max(parsed, MIN_WORKERS), MAX_WORKERS);
    log.warn(
      `Configured 'max_workers' (${parsed}) is out of allowed range ${MIN_WORKERS}-${MAX_WORKERS}; using ${clamped} instead`,
    );
    return clamped;
  }
  return parsed;
}

function resolvePlatform(cfg: ConfigFile, env: NodeJS.ProcessEnv): PlatformSettings {
  switch (cfg.platform) {
    case "gitlab": {
      if (!cfg.gitlab) {
        throw new ConfigurationError("Missing 'gitlab' section for platform 'gitlab'");
      }
      const token = cfg.gitlab.private_token || env.GITLAB_TOKEN;
      if (!token) {
        throw new ConfigurationError("Missing GitLab token: set 'gitlab.private_token' or GITLAB_TOKEN");
      }
      return { kind: "gitlab", url: cfg.gitlab.url.replace(/\/+$/, ""), token };
    }
    case "github": {
      const token = cfg.github?.token || env.GITHUB_TOKEN;
      if (!token) {
        throw new ConfigurationError("Missing GitHub token: set 'github.token' or GITHUB_TOKEN");
      }
      return { kind: "github", token, apiUrl: cfg.github?.api_url };
    }
  }
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError("Configuration must be a YAML mapping");
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(result.error)}`);
  }
  const cfg = result.data;

  const fallbackEmail = cfg.fallback_email?.trim() || null;
  if (!fallbackEmail) {
    log.warn("No 'fallback_email' configured: stale items without an active owner will not be notified");
  }

  return {
    platform: resolvePlatform(cfg, env),
    smtp: {
      host: cfg.smtp.host,
      port: cfg.smtp.port,
      fromEmail: cfg.smtp.from_email,
      useTls: cfg.smtp.use_tls,
      username: cfg.smtp.username,
      password: cfg.smtp.password,
    },
    projects: cfg.projects,
    staleDays: cfg.stale_days,
    cleanupWeeks: cfg.cleanup_weeks,
    notificationFrequencyDays: cfg.notification_frequency_days,
    mrCommentInactivityDays: cfg.mr_comment_inactivity_days,
    mrCommentFrequencyDays: cfg.mr_comment_frequency_days,
    maxWorkers: resolveMaxWorkers(cfg.max_workers),
    autoArchiveProjects: cfg.auto_archive_projects,
    optOutMarker: normalizeOptOutMarker(cfg.prevent_auto_archive_comment),
    fallbackEmail,
    databasePath: cfg.database_path,
    archiveFolder: cfg.archive_folder,
    enableAutoArchive: cfg.enable_auto_archive,
    enableMrComments: cfg.enable_mr_comments,
    mrCommentsFile: cfg.mr_comments_file,
    emailGreetingsFile: cfg.email_greetings_file,
    ignoreBranches: cfg.ignore_branches,
  };
}

export function loadConfig(configFilePath: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = resolve(configFilePath);
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, "utf-8"));
  } catch (err: unknown) {
    throw new ConfigurationError(`Invalid YAML in ${configPath}: ${log.errorMessage(err)}`);
  }
  return parseConfig(raw, env);
}

export function platformLabel(kind: PlatformKind): string {
  return kind === "gitlab" ? "GitLab" : "GitHub";
}

export const TEMPLATE_CONFIG = {
  platform: "gitlab",
  gitlab: {
    url: "https://gitlab.example.com",
    private_token: "your-token-here",
  },
  smtp: {
    host: "smtp.example.com",
    port: 587,
    from_email: "cleanup-bot@example.com",
    use_tls: true,
  },
  projects: ["group/project"],
  stale_days: 30,
  cleanup_weeks: 4,
  notification_frequency_days: 7,
  fallback_email: "maintainers@example.com",
  database_path: "./notification_history.db",
  archive_folder: "./archived_branches",
  enable_auto_archive: false,
  enable_mr_comments: false,
  mr_comment_inactivity_days: 14,
  mr_comment_frequency_days: 7,
  max_workers: DEFAULT_MAX_WORKERS,
  prevent_auto_archive_comment: DEFAULT_OPT_OUT_MARKER,
  ignore_branches: ["release/**"],
};

export function renderTemplateConfig(): string {
  return yaml.dump(TEMPLATE_CONFIG, { lineWidth: 100 });
}
