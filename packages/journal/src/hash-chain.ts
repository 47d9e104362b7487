/**
 * @vestline/journal — Hash chain for the tamper-evident journal.
 *
 * Each entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Changing, removing or reordering any entry breaks the chain from that
 * point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { LedgerEvent } from "@vestline/types";
import type { IntegrityError, JournalEntry, JournalIntegrityResult } from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalContent(event: LedgerEvent, position: number): string {
  return canonicalize({
    event: {
      type: event.type,
      metadata: event.metadata,
      payload: event.payload,
    },
    position,
  });
}

/**
 * @returns Hex-encoded SHA-256 of the entry content followed by previousHash
 */
export function computeEntryHash(
  event: LedgerEvent,
  position: number,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalContent(event, position) + previousHash)
    .digest("hex");
}

/**
 * Verify a run of entries in position order, starting at position 1.
 */
export function verifyHashChain(entries: readonly JournalEntry[]): JournalIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;
  let unbroken = true;

  entries.forEach((entry, index) => {
    const expectedPosition = index + 1;
    const before = errors.length;

    if (entry.position !== expectedPosition) {
      errors.push({
        position: entry.position,
        reason: `Position gap: expected ${expectedPosition}, got ${entry.position}`,
      });
    }

    if (entry.previousHash !== previousHash) {
      errors.push({
        position: entry.position,
        reason: `previousHash mismatch at position ${entry.position}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeEntryHash(entry.event, entry.position, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        position: entry.position,
        reason: `Hash mismatch at position ${entry.position}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    if (errors.length > before) unbroken = false;
    if (unbroken) lastVerifiedPosition = entry.position;
    previousHash = entry.hash;
  });

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
