import * as functions from 'firebase-functions';
import { safetyCheckConfig } from '../config';
import { captureException } from '../utils/sentry';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { DataLoadError } from './drugSafety/errors';
import { checkPrescription, CheckPrescriptionOptions } from './drugSafety/prescriptionCheck';
import { getReferenceData } from './drugSafety/referenceDataLoader';
import type { ReferenceDataStore } from './drugSafety/referenceDataStore';
import type { PrescriptionCheckRequest, PrescriptionCheckResult } from './drugSafety/types';

export type SafetyCheckOutcome =
  | { status: 'completed'; result: PrescriptionCheckResult }
  | { status: 'unavailable'; reason: 'timeout' | 'error'; message: string };

type PrescriptionCheckRunner = (
  store: ReferenceDataStore,
  request: PrescriptionCheckRequest,
  options: CheckPrescriptionOptions,
) => PrescriptionCheckResult | Promise<PrescriptionCheckResult>;

type PrescriptionSafetyServiceDependencies = {
  getStore?: () => ReferenceDataStore;
  runCheck?: PrescriptionCheckRunner;
  timeoutMs?: number;
};

function resolveDependencies(
  overrides: PrescriptionSafetyServiceDependencies = {},
): Required<PrescriptionSafetyServiceDependencies> {
  return {
    getStore: overrides.getStore ?? getReferenceData,
    runCheck: overrides.runCheck ?? checkPrescription,
    timeoutMs: overrides.timeoutMs ?? safetyCheckConfig.timeoutMs,
  };
}

const UNAVAILABLE_MESSAGE = 'Safety alerts are unavailable. Proceed with manual review.';

/**
 * Run a safety check under the configured time budget. Expiry or an
 * unexpected failure yields `unavailable` so the caller can fall back to
 * manual review. Invalid reference data still throws.
 */
export async function runPrescriptionSafetyCheck(
  request: PrescriptionCheckRequest,
  options: CheckPrescriptionOptions = {},
  dependencyOverrides: PrescriptionSafetyServiceDependencies = {},
): Promise<SafetyCheckOutcome> {
  const dependencies = resolveDependencies(dependencyOverrides);
  const store = dependencies.getStore();

  try {
    const result = await withTimeout(
      async () => dependencies.runCheck(store, request, options),
      dependencies.timeoutMs,
      'prescription safety check',
    );
    return { status: 'completed', result };
  } catch (error) {
    if (error instanceof DataLoadError) {
      throw error;
    }

    if (error instanceof TimeoutError) {
      functions.logger.warn('[prescriptionSafety] Safety check timed out', {
        prescriptionId: options.prescriptionId ?? null,
        timeoutMs: error.timeoutMs,
        newDrugs: request.newDrugs,
      });
      return { status: 'unavailable', reason: 'timeout', message: UNAVAILABLE_MESSAGE };
    }

    captureException(error, {
      operation: 'runPrescriptionSafetyCheck',
      prescriptionId: options.prescriptionId ?? null,
    });
    return { status: 'unavailable', reason: 'error', message: UNAVAILABLE_MESSAGE };
  }
}
