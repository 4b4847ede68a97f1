import { daysBefore } from "../dates.js";
import type { NotificationLedger } from "../ledger/notification-ledger.js";
import { itemKey, itemType, itemsOf, type RecipientItemSet } from "../types/index.js";

/**
 * "Notify on anything new, otherwise at most once per window."
 *
 * False for an empty set. True as soon as one item has never been sent to
 * this recipient. Otherwise true only when the oldest `last_notified_at`
 * across the set is older than `now - frequencyDays`.
 */
export function shouldNotify(
  ledger: NotificationLedger,
  recipient: string,
  items: RecipientItemSet,
  frequencyDays: number,
  now: Date = new Date(),
): boolean {
  const all = itemsOf(items);
  if (all.length === 0) return false;

  let oldest: Date | null = null;
  for (const item of all) {
    const last = ledger.lastNotifiedAt(recipient, itemType(item), item.projectId, itemKey(item));
    if (last === null) return true;
    if (oldest === null || last < oldest) oldest = last;
  }

  return oldest !== null && oldest < daysBefore(now, frequencyDays);
}

/** Ledger write for every item in a delivered email. Call only after a confirmed send. */
export function recordDelivery(
  ledger: NotificationLedger,
  recipient: string,
  items: RecipientItemSet,
  at: Date = new Date(),
): void {
  for (const item of itemsOf(items)) {
    ledger.recordNotification(recipient, itemType(item), item.projectId, itemKey(item), at);
  }
}
