/**
 * Provenance of a generation run.
 *
 * The registry hash identifies the exact declaration set an artifact set
 * was generated from, so two builds can be compared from their logs.
 */

import { createHash } from 'crypto';

/** Hash record for a declaration set or artifact. */
export interface HashRecord {
  algorithm: 'sha256';
  digest: string;
}

export function computeHash(data: string): HashRecord {
  const digest = createHash('sha256').update(data).digest('hex');
  return { algorithm: 'sha256', digest };
}
