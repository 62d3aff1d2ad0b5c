/**
 * Prescription Check
 *
 * Normalizes the request, runs every rule evaluator against the reference
 * store and aggregates the findings into ordered alerts. Synchronous and free
 * of I/O; the store is the only shared state and it is read-only.
 */

import * as functions from 'firebase-functions';
import { captureException } from '../../utils/sentry';
import { aggregate } from './alertAggregator';
import { DEFAULT_EVALUATORS, EvaluationContext, RuleEvaluator } from './evaluators';
import { normalizeAllergen, normalizeCondition, normalizeDrugName } from './nameNormalizer';
import type { ReferenceDataStore } from './referenceDataStore';
import type {
  CoverageReport,
  PrescriptionCheckRequest,
  PrescriptionCheckResult,
  RawFinding,
} from './types';

export interface CheckPrescriptionOptions {
  evaluators?: readonly RuleEvaluator[];
  /** Included in log lines and error reports when supplied. */
  prescriptionId?: string;
}

export function buildEvaluationContext(
  store: ReferenceDataStore,
  request: PrescriptionCheckRequest,
): EvaluationContext {
  return {
    store,
    newDrugs: request.newDrugs.map((name) => normalizeDrugName(store, name)),
    currentDrugs: request.currentDrugs.map((name) => normalizeDrugName(store, name)),
    conditions: [...new Set(request.conditions)].map((id) => normalizeCondition(store, id)),
    allergies: [...new Set(request.allergies)].map((name) => normalizeAllergen(store, name)),
    patient: request.patient,
  };
}

function coverageFor(context: EvaluationContext, failedEvaluators: string[]): CoverageReport {
  const unrecognizedDrugs: string[] = [];
  for (const drug of [...context.newDrugs, ...context.currentDrugs]) {
    if (drug.status === 'unrecognized') unrecognizedDrugs.push(drug.rawName);
  }
  const unrecognizedConditions: string[] = [];
  for (const condition of context.conditions) {
    if (condition.status === 'unrecognized') unrecognizedConditions.push(condition.rawId);
  }
  const unrecognizedAllergies: string[] = [];
  for (const allergen of context.allergies) {
    if (allergen.status === 'unrecognized') unrecognizedAllergies.push(allergen.rawName);
  }

  return { unrecognizedDrugs, unrecognizedConditions, unrecognizedAllergies, failedEvaluators };
}

/**
 * Run a full safety check. An evaluator that throws does not abort the check:
 * its gap is reported as an informational alert and in `coverage`.
 */
export function checkPrescription(
  store: ReferenceDataStore,
  request: PrescriptionCheckRequest,
  options: CheckPrescriptionOptions = {},
): PrescriptionCheckResult {
  const startedAt = Date.now();
  const evaluators = options.evaluators ?? DEFAULT_EVALUATORS;
  const context = buildEvaluationContext(store, request);

  const findings: RawFinding[] = [];
  const failedEvaluators: string[] = [];

  for (const evaluator of evaluators) {
    try {
      findings.push(...evaluator.evaluate(context));
    } catch (error) {
      failedEvaluators.push(evaluator.name);
      functions.logger.error(`[prescriptionCheck] Evaluator ${evaluator.name} failed`, {
        prescriptionId: options.prescriptionId ?? null,
        newDrugs: request.newDrugs,
        error: error instanceof Error ? error.message : String(error),
      });
      captureException(error, {
        evaluator: evaluator.name,
        prescriptionId: options.prescriptionId ?? null,
      });
      findings.push({
        kind: 'unrecognized',
        severity: 'minor',
        subject: 'screening',
        rawValue: evaluator.name,
        lookupKey: evaluator.name,
      });
    }
  }

  const alerts = aggregate(findings);
  const coverage = coverageFor(context, failedEvaluators);

  functions.logger.info('[prescriptionCheck] Safety check complete', {
    prescriptionId: options.prescriptionId ?? null,
    newDrugs: request.newDrugs,
    currentDrugCount: request.currentDrugs.length,
    findingCount: findings.length,
    alertCount: alerts.length,
    alertIds: alerts.map((alert) => alert.id),
    unrecognizedDrugs: coverage.unrecognizedDrugs,
    failedEvaluators,
    durationMs: Date.now() - startedAt,
  });

  return { alerts, coverage };
}
