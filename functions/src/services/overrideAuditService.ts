import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { overrideConfig } from '../config';
import { DrugSafetyError, UnknownAlertError } from './drugSafety/errors';
import {
  ChainVerification,
  OverrideDecision,
  OverrideRecord,
  OverrideScope,
  OverrideTransaction,
  TransactionStatus,
  verifyOverrideChain,
} from './drugSafety/overrideLedger';
import type { Alert } from './drugSafety/types';
import { FirestoreOverrideAuditRepository, OverrideAuditRepository } from './repositories/overrideAudit';

const getDb = () => admin.firestore();

export type OverrideDecisionInput = {
  alertId: string;
  decision: OverrideDecision;
  reason?: string | null;
};

type RecordPrescriptionOverridesInput = {
  scope: OverrideScope;
  clinicianId: string;
  alerts: readonly Alert[];
  decisions: readonly OverrideDecisionInput[];
  transactionId?: string;
  now?: () => Date;
};

export type RecordPrescriptionOverridesResult = {
  transactionId: string;
  status: TransactionStatus;
  unresolvedAlertIds: string[];
  records: OverrideRecord[];
  auditIds: string[];
};

type OverrideAuditServiceDependencies = {
  overrideAuditRepository?: OverrideAuditRepository;
};

function resolveDependencies(
  overrides: OverrideAuditServiceDependencies = {},
): Required<OverrideAuditServiceDependencies> {
  return {
    overrideAuditRepository:
      overrides.overrideAuditRepository ?? new FirestoreOverrideAuditRepository(getDb()),
  };
}

/**
 * Apply the prescriber's decisions to a fresh transaction and persist the
 * resulting records. A rejected decision aborts before anything is written.
 */
export async function recordPrescriptionOverrides(
  input: RecordPrescriptionOverridesInput,
  dependencyOverrides: OverrideAuditServiceDependencies = {},
): Promise<RecordPrescriptionOverridesResult> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const transaction = new OverrideTransaction(input.scope, input.alerts, {
    transactionId: input.transactionId,
    clinicianId: input.clinicianId,
    now: input.now,
    reasonMinLength: overrideConfig.reasonMinLength,
    reasonMaxLength: overrideConfig.reasonMaxLength,
  });
  const alertsById = new Map(input.alerts.map((alert) => [alert.id, alert]));

  for (const decision of input.decisions) {
    const alert = alertsById.get(decision.alertId);
    if (!alert) {
      throw new UnknownAlertError(decision.alertId);
    }
    transaction.record(alert, decision.decision, decision.reason);
  }

  const records = [...transaction.records];
  const verification = verifyOverrideChain(records);
  if (!verification.valid) {
    throw new DrugSafetyError(
      'audit_chain_invalid',
      `Override chain broken at record ${verification.brokenAt} (${verification.problem})`,
    );
  }

  const auditIds = await dependencies.overrideAuditRepository.appendRecords(records);
  const status = transaction.status();
  const unresolvedAlertIds = transaction.unresolvedBlockingAlerts().map((alert) => alert.id);

  functions.logger.info('[overrideAudit] Stored override decisions', {
    prescriptionId: input.scope.prescriptionId,
    transactionId: transaction.transactionId,
    recordCount: records.length,
    status,
    unresolvedCount: unresolvedAlertIds.length,
  });

  return {
    transactionId: transaction.transactionId,
    status,
    unresolvedAlertIds,
    records,
    auditIds,
  };
}

/**
 * Load a stored transaction and re-verify its hash chain.
 */
export async function verifyStoredOverrides(
  transactionId: string,
  dependencyOverrides: OverrideAuditServiceDependencies = {},
): Promise<{ records: OverrideRecord[]; verification: ChainVerification }> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const records = await dependencies.overrideAuditRepository.listByTransaction(transactionId);
  const verification = verifyOverrideChain(records);

  if (!verification.valid) {
    functions.logger.error('[overrideAudit] Stored override chain failed verification', {
      transactionId,
      brokenAt: verification.brokenAt,
      problem: verification.problem,
    });
  }

  return { records, verification };
}

export type StoredOverrideTransaction = {
  transactionId: string;
  records: OverrideRecord[];
  verification: ChainVerification;
};

/**
 * Every stored save attempt for a prescription, oldest first, each with its
 * own chain verification.
 */
export async function listPrescriptionOverrides(
  prescriptionId: string,
  dependencyOverrides: OverrideAuditServiceDependencies = {},
): Promise<StoredOverrideTransaction[]> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const records = await dependencies.overrideAuditRepository.listByPrescription(prescriptionId);

  const byTransaction = new Map<string, OverrideRecord[]>();
  records.forEach((record) => {
    const group = byTransaction.get(record.transactionId) ?? [];
    group.push(record);
    byTransaction.set(record.transactionId, group);
  });

  return [...byTransaction.entries()].map(([transactionId, group]) => {
    const ordered = [...group].sort((a, b) => a.sequence - b.sequence);
    const verification = verifyOverrideChain(ordered);
    if (!verification.valid) {
      functions.logger.error('[overrideAudit] Stored override chain failed verification', {
        transactionId,
        prescriptionId,
        brokenAt: verification.brokenAt,
        problem: verification.problem,
      });
    }
    return { transactionId, records: ordered, verification };
  });
}
