/**
 * Alert address filtering.
 *
 * Directory entries are often left with template text where an address
 * should be ("{{email}}", "${SETTLEMENT_EMAIL}", "<fill me>", "%EMAIL%").
 * Such entries, and anything that is not an email address, never reach a
 * delivery channel.
 */

import type { AlertRecipient } from "@closeout/types";

const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  /\{\{.*\}\}/,
  /\$\{.*\}/,
  /<[^>]*>/,
  /%[^%\s]+%/,
];

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function isPlaceholder(address: string): boolean {
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(address));
}

export function isDeliverableAddress(address: string): boolean {
  const trimmed = address.trim();
  return trimmed.length > 0 && !isPlaceholder(trimmed) && EMAIL_PATTERN.test(trimmed);
}

export interface DroppedAddress {
  readonly participantId: string;
  readonly address: string;
}

export interface FilteredRecipients {
  readonly deliverable: readonly AlertRecipient[];
  readonly dropped: readonly DroppedAddress[];
  /** Participants left without any deliverable address */
  readonly unreachable: readonly string[];
}

/**
 * Keep deliverable addresses (trimmed, de-duplicated) and drop recipients
 * left with none.
 */
export function filterRecipients(recipients: readonly AlertRecipient[]): FilteredRecipients {
  const deliverable: AlertRecipient[] = [];
  const dropped: DroppedAddress[] = [];
  const unreachable: string[] = [];

  for (const recipient of recipients) {
    const addresses = new Set<string>();
    for (const address of recipient.addresses) {
      if (isDeliverableAddress(address)) {
        addresses.add(address.trim());
      } else {
        dropped.push({ participantId: recipient.participantId, address });
      }
    }

    if (addresses.size === 0) {
      unreachable.push(recipient.participantId);
      continue;
    }
    deliverable.push({ ...recipient, addresses: [...addresses] });
  }

  return { deliverable, dropped, unreachable };
}
