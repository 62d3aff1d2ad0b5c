import type { OverrideRecord } from '../../drugSafety/overrideLedger';

export interface OverrideAuditRepository {
  /** Create-only: fails if any record of the transaction was already stored. */
  appendRecords(records: readonly OverrideRecord[]): Promise<string[]>;
  listByTransaction(transactionId: string): Promise<OverrideRecord[]>;
  listByPrescription(prescriptionId: string): Promise<OverrideRecord[]>;
}
