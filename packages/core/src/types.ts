/**
 * Identifies one running process (a "session") that can hold a lease.
 * `processId` names the deployment or host group, `jobId` the individual process.
 */
export interface SessionTag {
  processId: string;
  jobId: string;
}

/**
 * Lock and bookkeeping fields stored next to every record payload.
 * Only the lock protocol writes these, except `metaTags` which the owning lease persists.
 */
export interface RecordMetadata {
  /** Current lease holder, absent when the record is free */
  activeSession?: SessionTag;
  /** Process that asked the holder to give the record up; present only while a takeover is pending */
  forceLoadSession?: SessionTag;
  /** Incremented on every successful claim */
  sessionLoadCount: number;
  /** Epoch ms, written once when the record is created */
  profileCreateTime: number;
  /** Epoch ms of the last persist by the holder, used to judge lease liveness */
  lastUpdate: number;
  metaTags: Record<string, unknown>;
}

export type RecordData = Record<string, unknown>;

/**
 * The value persisted under one key.
 */
export interface StoredRecord<T extends object = RecordData> {
  data: T;
  metadata: RecordMetadata;
}

export function isSameSession(a: SessionTag | undefined, b: SessionTag | undefined): boolean {
  if (!a || !b) return false;
  return a.processId === b.processId && a.jobId === b.jobId;
}

export function formatSession(tag: SessionTag | undefined): string {
  return tag ? `${tag.processId}/${tag.jobId}` : '<none>';
}

/**
 * A lease is considered abandoned once its holder has not persisted for `deadAfterMs`.
 */
export function isSessionDead(metadata: RecordMetadata, now: number, deadAfterMs: number): boolean {
  return now - metadata.lastUpdate > deadAfterMs;
}
