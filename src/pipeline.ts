import { existsSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { attributeScan, mergeAttributions, RecipientResolver, scanProject } from "./analysis/classifier.js";
import { runArchivePass } from "./automation/archive/index.js";
import { runReminderComments } from "./automation/reminder-comments.js";
import { fanOutProjects } from "./concurrency.js";
import { DEFAULT_CONFIG_FILE, loadConfig, platformLabel, renderTemplateConfig, type AppConfig } from "./config.js";
import { NotificationLedger } from "./ledger/notification-ledger.js";
import { loadMessagePools } from "./messages.js";
import { createSmtpSender, notifyRecipients } from "./notifications/index.js";
import { createPlatform } from "./platforms/index.js";
import { printRunSummary } from "./reporting/run-summary.js";
import type { HostingPlatform, ProjectScan, RunSummary } from "./types/index.js";
import * as log from "./log.js";

export interface RunOptions {
  config?: string;
  dryRun: boolean;
  verbose: boolean;
  /** Force the archive pass even when `enable_auto_archive` is off. */
  archive: boolean;
  now?: Date;
  random?: () => number;
}

export function runSetup(): void {
  const configPath = resolve(DEFAULT_CONFIG_FILE);
  if (existsSync(configPath)) {
    log.warn(`Config file already exists: ${configPath}`);
    log.info("Remove or rename the existing file and try again.");
    process.exit(1);
  }
  writeFileSync(configPath, renderTemplateConfig(), "utf-8");
  log.success(`Created template config: ${configPath}`);
  log.info("Edit the file to add your platform token, SMTP server and project list.");
}

async function scanAll(platform: HostingPlatform, config: AppConfig, now: Date) {
  const resolver = new RecipientResolver(platform, config.fallbackEmail);
  const outcomes = await fanOutProjects(config.projects, config.maxWorkers, "Scanning", async (projectId) => {
    const scan = await scanProject(platform, projectId, config.staleDays, now, {
      ignoreBranches: config.ignoreBranches,
    });
    return { scan, attribution: await attributeScan(scan, resolver, platform.requestPrefix) };
  });

  const scans: ProjectScan[] = outcomes.map((o) => o.result.scan);
  const attribution = mergeAttributions(outcomes.map((o) => o.result.attribution));
  return { scans, attribution };
}

/**
 * Notification pass, then reminder comments (when enabled), then the archive
 * pass (when enabled or forced). The archive pass reuses this run's scans.
 */
export async function runLifecycle(options: RunOptions): Promise<RunSummary> {
  log.setVerbose(options.verbose);
  if (options.dryRun) log.dryRun("No emails, comments, closes or deletions will be performed");

  log.info("Loading configuration…");
  const config = loadConfig(options.config ?? DEFAULT_CONFIG_FILE);
  const platform = createPlatform(config.platform);
  const sender = createSmtpSender(config.smtp);
  const pools = loadMessagePools({
    mrCommentsFile: config.mrCommentsFile,
    emailGreetingsFile: config.emailGreetingsFile,
  });
  const now = options.now ?? new Date();

  const ledger = NotificationLedger.open(config.databasePath);
  try {
    log.heading(`Scanning ${config.projects.length} project(s) on ${platformLabel(platform.kind)}`);
    log.info(`Stale after ${config.staleDays} days (workers: ${config.maxWorkers})…`);
    const startScan = Date.now();
    const { scans, attribution } = await scanAll(platform, config, now);
    log.success(
      `Scanned ${scans.length}/${config.projects.length} project(s), ${attribution.byRecipient.size} recipient(s) (${Date.now() - startScan}ms)`,
    );

    const summary: RunSummary = {
      notifications: await notifyRecipients(platform, ledger, attribution, sender, {
        staleDays: config.staleDays,
        cleanupWeeks: config.cleanupWeeks,
        frequencyDays: config.notificationFrequencyDays,
        dryRun: options.dryRun,
        greetings: pools.emailGreetings,
        now,
        random: options.random,
      }),
    };

    if (config.enableMrComments) {
      summary.comments = await runReminderComments(
        platform,
        ledger,
        config.projects,
        config.maxWorkers,
        pools.reminderComments,
        {
          inactivityDays: config.mrCommentInactivityDays,
          frequencyDays: config.mrCommentFrequencyDays,
          dryRun: options.dryRun,
          ignoreBranches: config.ignoreBranches,
          now,
          random: options.random,
        },
      );
    } else {
      log.debug("Reminder comments are disabled (enable_mr_comments: false)");
    }

    if (options.archive || config.enableAutoArchive) {
      summary.archive = await runArchivePass(platform, ledger, scans, config.maxWorkers, {
        cleanupWeeks: config.cleanupWeeks,
        optOutMarker: config.optOutMarker,
        archiveFolder: config.archiveFolder,
        dryRun: options.dryRun,
        autoArchiveProjects: config.autoArchiveProjects,
        now,
      });
    } else {
      log.debug("Automatic archiving is disabled (enable_auto_archive: false)");
    }

    printRunSummary(summary, { dryRun: options.dryRun, requestPrefix: platform.requestPrefix });
    return summary;
  } finally {
    ledger.close();
  }
}
