export * from './types';
export * from './errors';
export * from './config';
export { SessionTagSchema, RecordMetadataSchema, StoredRecordSchema } from './schemas';
export { encodeRecord, decodeRecord } from './serializer';
export { deepCopy, reconcile } from './utils/reconcile';
export { Notifier, type Listener, type Subscription, type ListenerErrorHandler } from './Notifier';
