/**
 * @hourglass/event-store — Hash chain for the tamper-evident notification log.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous record's hash, forming a chain:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * JCS has no bigint, so uint256 fields are rendered as decimal strings
 * before canonicalization.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ExecutorNotification } from "@hourglass/types";
import type {
  IntegrityError,
  IntegrityResult,
  StoredNotification,
  UnhashedNotification,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first record.
 */
export const GENESIS_HASH = "genesis";

function notificationFields(notification: ExecutorNotification): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(notification)) {
    fields[key] = typeof value === "bigint" ? value.toString(10) : String(value);
  }
  return fields;
}

function canonicalContent(record: UnhashedNotification): string {
  return canonicalize({
    notification: notificationFields(record.notification),
    emitter: record.emitter.toLowerCase(),
    position: record.position,
    blockTime: record.blockTime.toString(10),
  });
}

/**
 * Compute the hex SHA-256 hash of a record given its predecessor's hash.
 */
export function computeNotificationHash(
  record: UnhashedNotification,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalContent(record) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of a sequence of records in position order.
 *
 * Reports every broken link and every record whose content no longer
 * matches its hash; does not stop at the first error.
 */
export function verifyHashChain(
  records: readonly StoredNotification[],
): IntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const record of records) {
    if (record.previousHash !== previousHash) {
      errors.push({
        position: record.position,
        reason: `previousHash mismatch at position ${record.position}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expected = computeNotificationHash(record, record.previousHash);
    if (record.hash !== expected) {
      errors.push({
        position: record.position,
        reason: `Hash mismatch at position ${record.position}: expected "${expected}", got "${record.hash}"`,
      });
    }

    previousHash = record.hash;
    lastVerifiedPosition = record.position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
