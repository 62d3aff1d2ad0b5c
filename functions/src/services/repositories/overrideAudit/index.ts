export type { OverrideAuditRepository } from './OverrideAuditRepository';
export { buildOverrideAuditDocId, FirestoreOverrideAuditRepository } from './FirestoreOverrideAuditRepository';
