import { z } from 'zod';

// --- Session Tags ---

export const SessionTagSchema = z.object({
  processId: z.string().min(1),
  jobId: z.string().min(1),
});

// msgpack may hand back `null` for fields that were cleared, so treat both as absent.
const OptionalSessionTagSchema = SessionTagSchema.nullish().transform((tag) => tag ?? undefined);

// --- Record Metadata ---

export const RecordMetadataSchema = z.object({
  activeSession: OptionalSessionTagSchema,
  forceLoadSession: OptionalSessionTagSchema,
  sessionLoadCount: z.number().int().nonnegative(),
  profileCreateTime: z.number().nonnegative(),
  lastUpdate: z.number().nonnegative(),
  metaTags: z
    .record(z.string(), z.unknown())
    .nullish()
    .transform((tags) => tags ?? {}),
});

/**
 * Shape of a decoded record. Payloads must be plain objects; anything else is corruption.
 */
export const StoredRecordSchema = z.object({
  data: z.record(z.string(), z.unknown()),
  metadata: RecordMetadataSchema,
});
