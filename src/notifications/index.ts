import { shouldNotify, recordDelivery } from "../automation/throttle.js";
import type { NotificationLedger } from "../ledger/notification-ledger.js";
import { pickRandom, renderGreeting } from "../messages.js";
import {
  emptyNotificationSummary,
  type HostingPlatform,
  type NotificationSummary,
  type ProjectAttribution,
} from "../types/index.js";
import { buildEmailSubject, renderEmailHtml } from "./email-content.js";
import type { EmailSender } from "./email.js";
import * as log from "../log.js";

export { createSmtpSender, type EmailSender } from "./email.js";
export { buildEmailSubject, renderEmailHtml, escapeHtml } from "./email-content.js";

export interface NotifyOptions {
  staleDays: number;
  cleanupWeeks: number;
  frequencyDays: number;
  dryRun: boolean;
  greetings: readonly string[];
  now?: Date;
  random?: () => number;
}

/**
 * One email per recipient, throttled through the ledger. A delivery is
 * recorded only after the sender confirms it; dry runs count as sent and
 * leave the ledger untouched.
 */
export async function notifyRecipients(
  platform: HostingPlatform,
  ledger: NotificationLedger,
  attribution: ProjectAttribution,
  sender: EmailSender,
  options: NotifyOptions,
): Promise<NotificationSummary> {
  const now = options.now ?? new Date();
  const random = options.random ?? Math.random;
  const summary = emptyNotificationSummary();
  summary.itemsDropped = attribution.dropped.length;

  log.heading("Notifications");

  for (const [recipient, items] of attribution.byRecipient) {
    summary.totalStaleBranches += items.branches.length;
    summary.totalStaleRequests += items.mergeRequests.length;

    if (!shouldNotify(ledger, recipient, items, options.frequencyDays, now)) {
      log.info(
        `Skipping notification to ${recipient} - already notified within ${options.frequencyDays} days and no new items`,
      );
      summary.emailsSkipped++;
      continue;
    }

    const subject = buildEmailSubject(items, platform.requestNoun);
    const html = renderEmailHtml(items, {
      staleDays: options.staleDays,
      cleanupWeeks: options.cleanupWeeks,
      greeting: renderGreeting(pickRandom(options.greetings, random), options.staleDays),
      requestNoun: platform.requestNoun,
      requestPrefix: platform.requestPrefix,
    });

    if (options.dryRun) {
      log.dryRun(`Would send email to: ${recipient}`);
      log.debug(`Subject: ${subject}`);
      summary.emailsSent++;
      summary.recipients.push(recipient);
      continue;
    }

    if (await sender.send(recipient, subject, html)) {
      recordDelivery(ledger, recipient, items, now);
      summary.emailsSent++;
      summary.recipients.push(recipient);
    } else {
      summary.emailsFailed++;
    }
  }

  return summary;
}
