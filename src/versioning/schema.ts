import { z } from 'zod';

/**
 * On-disk shape of the tracked-files index.
 *
 * Only the skeleton is enforced: the index, each tracked file and each
 * version entry must be objects. Leaf fields are left unknown and narrowed
 * by the readers, so one malformed version never gets the whole index
 * quarantined. Unknown keys are kept so they round-trip.
 */

export const versionEntrySchema = z.looseObject({
  timestamp: z.unknown().optional(),
  username: z.unknown().optional(),
  commit_message: z.unknown().optional(),
  metadata: z.unknown().optional(),
  deleted: z.unknown().optional(),
});

export const trackedFileSchema = z.looseObject({
  last_updated: z.unknown().optional(),
  versions: z.record(z.string(), versionEntrySchema).optional(),
});

export const trackedFilesIndexSchema = z.record(z.string(), trackedFileSchema);
