/**
 * Override Ledger
 *
 * One OverrideTransaction per prescription save attempt. It holds the alerts
 * from the safety check, accepts proceed/cancel decisions for them, and
 * produces append-only, hash-chained OverrideRecords for the audit store.
 *
 * The prescription may be saved only once every blocking alert has a
 * `proceeded` record and nothing was cancelled.
 */

import { createHash, randomUUID } from 'crypto';
import * as functions from 'firebase-functions';
import { isBlockingAlert } from './alertAggregator';
import {
  BlockedDecisionError,
  MissingReasonError,
  SaveBlockedError,
  UnknownAlertError,
} from './errors';
import type { Alert, AlertKind, Severity } from './types';
import { sanitizePlainText } from '../../utils/inputSanitization';

export const GENESIS_HASH = 'genesis';
export const DEFAULT_REASON_MIN_LENGTH = 10;
export const DEFAULT_REASON_MAX_LENGTH = 500;

/** Reasons offered to the prescriber when overriding an alert. */
export const COMMON_OVERRIDE_REASONS = [
  'Benefit outweighs risk for this patient',
  'Patient has tolerated this combination previously',
  'Will monitor closely with follow-up labs',
  'Dose adjusted to account for this risk',
  'Short-term use only',
  'No suitable alternative available',
  'Specialist recommendation',
] as const;

export type OverrideDecision = 'proceeded' | 'cancelled';

export type TransactionStatus = 'ready' | 'blocked' | 'cancelled';

export interface OverrideScope {
  patientId: string;
  visitId?: string | null;
  prescriptionId: string;
}

export interface OverrideTransactionOptions {
  transactionId?: string;
  clinicianId?: string | null;
  now?: () => Date;
  reasonMinLength?: number;
  reasonMaxLength?: number;
}

export interface OverrideRecord {
  readonly transactionId: string;
  readonly sequence: number;
  readonly patientId: string;
  readonly visitId: string | null;
  readonly prescriptionId: string;
  readonly alertId: string;
  readonly alertKind: AlertKind;
  readonly severity: Severity;
  /** Drug pair, drug/condition or class the alert concerns. */
  readonly subject: string;
  readonly decision: OverrideDecision;
  readonly reason: string | null;
  readonly clinicianId: string | null;
  readonly recordedAt: string;
  readonly previousHash: string;
  readonly hash: string;
}

type HashableRecord = Omit<OverrideRecord, 'hash'>;

export function computeRecordHash(record: HashableRecord): string {
  const payload = JSON.stringify([
    record.transactionId,
    record.sequence,
    record.patientId,
    record.visitId,
    record.prescriptionId,
    record.alertId,
    record.alertKind,
    record.severity,
    record.subject,
    record.decision,
    record.reason,
    record.clinicianId,
    record.recordedAt,
    record.previousHash,
  ]);
  return createHash('sha256').update(payload).digest('hex');
}

export type ChainVerification =
  | { valid: true }
  | { valid: false; brokenAt: number; problem: 'sequence' | 'previous_hash' | 'hash' };

/**
 * Walk the chain from the genesis hash. Reports the first record whose
 * sequence, link or content hash does not match.
 */
export function verifyOverrideChain(records: readonly OverrideRecord[]): ChainVerification {
  let previousHash = GENESIS_HASH;

  for (const [index, record] of records.entries()) {
    if (record.sequence !== index + 1) {
      return { valid: false, brokenAt: index, problem: 'sequence' };
    }
    if (record.previousHash !== previousHash) {
      return { valid: false, brokenAt: index, problem: 'previous_hash' };
    }
    const { hash, ...rest } = record;
    if (computeRecordHash(rest) !== hash) {
      return { valid: false, brokenAt: index, problem: 'hash' };
    }
    previousHash = hash;
  }

  return { valid: true };
}

export class OverrideTransaction {
  readonly transactionId: string;
  private readonly alertsById: Map<string, Alert>;
  private readonly ledger: OverrideRecord[] = [];
  private readonly clinicianId: string | null;
  private readonly now: () => Date;
  private readonly reasonMinLength: number;
  private readonly reasonMaxLength: number;

  constructor(
    readonly scope: OverrideScope,
    alerts: readonly Alert[],
    options: OverrideTransactionOptions = {},
  ) {
    this.transactionId = options.transactionId ?? randomUUID();
    this.alertsById = new Map(alerts.map((alert) => [alert.id, alert]));
    this.clinicianId = options.clinicianId ?? null;
    this.now = options.now ?? (() => new Date());
    this.reasonMinLength = options.reasonMinLength ?? DEFAULT_REASON_MIN_LENGTH;
    this.reasonMaxLength = options.reasonMaxLength ?? DEFAULT_REASON_MAX_LENGTH;
  }

  get records(): readonly OverrideRecord[] {
    return [...this.ledger];
  }

  get alerts(): Alert[] {
    return [...this.alertsById.values()];
  }

  /**
   * Append a decision for one alert. Fails without appending when the alert
   * is not part of this check, cannot be overridden, or needs a documented
   * reason that was not given.
   */
  record(alert: Alert, decision: OverrideDecision, reason?: string | null): OverrideRecord {
    const known = this.alertsById.get(alert.id);
    if (!known) {
      throw new UnknownAlertError(alert.id);
    }

    const sanitizedReason =
      typeof reason === 'string' ? sanitizePlainText(reason, this.reasonMaxLength) : '';

    if (decision === 'proceeded') {
      if (!known.canOverride) {
        throw new BlockedDecisionError(known.id);
      }
      if (known.overrideRequiresReason && sanitizedReason.length < this.reasonMinLength) {
        throw new MissingReasonError(known.id, this.reasonMinLength);
      }
    }

    const previous = this.ledger[this.ledger.length - 1];
    const unsigned: HashableRecord = {
      transactionId: this.transactionId,
      sequence: this.ledger.length + 1,
      patientId: this.scope.patientId,
      visitId: this.scope.visitId ?? null,
      prescriptionId: this.scope.prescriptionId,
      alertId: known.id,
      alertKind: known.kind,
      severity: known.severity,
      subject: known.details.drugs.join('+') || known.id,
      decision,
      reason: sanitizedReason.length > 0 ? sanitizedReason : null,
      clinicianId: this.clinicianId,
      recordedAt: this.now().toISOString(),
      previousHash: previous ? previous.hash : GENESIS_HASH,
    };
    const entry: OverrideRecord = Object.freeze({ ...unsigned, hash: computeRecordHash(unsigned) });
    this.ledger.push(entry);

    functions.logger.info('[overrideLedger] Recorded override decision', {
      prescriptionId: entry.prescriptionId,
      transactionId: entry.transactionId,
      sequence: entry.sequence,
      alertId: entry.alertId,
      severity: entry.severity,
      decision,
      hasReason: entry.reason !== null,
    });

    return entry;
  }

  /** Blocking alerts that do not yet have a `proceeded` record. */
  unresolvedBlockingAlerts(): Alert[] {
    const proceeded = new Set(
      this.ledger.filter((entry) => entry.decision === 'proceeded').map((entry) => entry.alertId),
    );
    return this.alerts.filter((alert) => isBlockingAlert(alert) && !proceeded.has(alert.id));
  }

  status(): TransactionStatus {
    if (this.ledger.some((entry) => entry.decision === 'cancelled')) {
      return 'cancelled';
    }
    return this.unresolvedBlockingAlerts().length > 0 ? 'blocked' : 'ready';
  }

  assertReadyToSave(): void {
    const status = this.status();
    if (status === 'ready') {
      return;
    }
    throw new SaveBlockedError(
      this.unresolvedBlockingAlerts().map((alert) => alert.id),
      status === 'cancelled',
    );
  }
}
