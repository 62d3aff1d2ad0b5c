import { Response, Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { overrideConfig } from '../config';
import { AuthRequest, requireAuth, requireClinician } from '../middlewares/auth';
import { toErrorResponse } from '../middlewares/errorHandler';
import { overrideLimiter } from '../middlewares/rateLimit';
import { isBlockingAlert } from '../services/drugSafety/alertAggregator';
import { COMMON_OVERRIDE_REASONS } from '../services/drugSafety/overrideLedger';
import type { PrescriptionCheckRequest } from '../services/drugSafety/types';
import {
  listPrescriptionOverrides,
  recordPrescriptionOverrides,
  verifyStoredOverrides,
} from '../services/overrideAuditService';
import { runPrescriptionSafetyCheck } from '../services/prescriptionSafetyService';
import { captureException } from '../utils/sentry';
import { sanitizeTerm, sanitizeTermList } from '../utils/inputSanitization';

type PrescriptionSafetyRouterOptions = {
  runSafetyCheck?: typeof runPrescriptionSafetyCheck;
  recordOverrides?: typeof recordPrescriptionOverrides;
  verifyOverrides?: typeof verifyStoredOverrides;
  listOverrides?: typeof listPrescriptionOverrides;
};

const identifierSchema = z.string().trim().min(1).max(128);

const patientSchema = z.object({
  age: z.number().int().min(0).max(130),
  gender: z.enum(['female', 'male', 'other', 'unknown']).default('unknown'),
  egfr: z.number().nonnegative().optional(),
  pregnant: z.boolean().optional(),
});

const checkRequestSchema = z.object({
  newDrugs: z.array(z.string()).min(1).max(50),
  currentDrugs: z.array(z.string()).max(100).default([]),
  conditions: z.array(z.string()).max(50).default([]),
  allergies: z.array(z.string()).max(50).default([]),
  patient: patientSchema,
});

const checkBodySchema = checkRequestSchema.extend({
  prescriptionId: identifierSchema.optional(),
});

const overrideBodySchema = z.object({
  scope: z.object({
    patientId: identifierSchema,
    visitId: identifierSchema.nullable().optional(),
    prescriptionId: identifierSchema,
  }),
  check: checkRequestSchema,
  decisions: z
    .array(
      z.object({
        alertId: z.string().min(1),
        decision: z.enum(['proceeded', 'cancelled']),
        reason: z.string().max(overrideConfig.reasonMaxLength * 2).nullable().optional(),
      }),
    )
    .max(100),
});

function toCheckRequest(data: z.infer<typeof checkRequestSchema>): PrescriptionCheckRequest {
  return {
    newDrugs: sanitizeTermList(data.newDrugs),
    currentDrugs: sanitizeTermList(data.currentDrugs),
    conditions: sanitizeTermList(data.conditions),
    allergies: sanitizeTermList(data.allergies),
    patient: data.patient,
  };
}

function sendError(res: Response, error: unknown, context: Record<string, unknown>): void {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    captureException(error, context);
  }
  res.status(status).json(body);
}

export function createPrescriptionSafetyRouter(options: PrescriptionSafetyRouterOptions = {}): Router {
  const router = Router();
  const runSafetyCheck = options.runSafetyCheck ?? runPrescriptionSafetyCheck;
  const recordOverrides = options.recordOverrides ?? recordPrescriptionOverrides;
  const verifyOverrides = options.verifyOverrides ?? verifyStoredOverrides;
  const listOverrides = options.listOverrides ?? listPrescriptionOverrides;

  /**
   * POST /v1/prescription-safety/check
   * Screen new drugs against current drugs, conditions, allergies and demographics
   */
  router.post('/check', requireAuth, requireClinician, async (req: AuthRequest, res) => {
    try {
      const data = checkBodySchema.parse(req.body);
      const request = toCheckRequest(data);

      if (request.newDrugs.length === 0) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'At least one new drug name is required',
        });
        return;
      }

      const outcome = await runSafetyCheck(request, { prescriptionId: data.prescriptionId });

      if (outcome.status === 'unavailable') {
        res.json(outcome);
        return;
      }

      const { alerts, coverage } = outcome.result;
      res.json({
        status: 'completed',
        alerts,
        coverage,
        blockingAlertIds: alerts.filter(isBlockingAlert).map((alert) => alert.id),
      });
    } catch (error) {
      sendError(res, error, { route: 'POST /check' });
    }
  });

  /**
   * POST /v1/prescription-safety/overrides
   * Re-run the check server-side, apply the prescriber's decisions and store the audit trail
   */
  router.post('/overrides', overrideLimiter, requireAuth, requireClinician, async (req: AuthRequest, res) => {
    try {
      const clinicianId = req.user?.uid;
      if (!clinicianId) {
        res.status(401).json({ code: 'unauthorized', message: 'Authentication required' });
        return;
      }

      const data = overrideBodySchema.parse(req.body);
      const request = toCheckRequest(data.check);
      const scope = {
        patientId: sanitizeTerm(data.scope.patientId),
        visitId: data.scope.visitId ? sanitizeTerm(data.scope.visitId) : null,
        prescriptionId: sanitizeTerm(data.scope.prescriptionId),
      };

      const outcome = await runSafetyCheck(request, { prescriptionId: scope.prescriptionId });
      if (outcome.status === 'unavailable') {
        res.status(503).json({
          code: 'safety_check_unavailable',
          message: outcome.message,
        });
        return;
      }

      const result = await recordOverrides({
        scope,
        clinicianId,
        alerts: outcome.result.alerts,
        decisions: data.decisions,
      });

      functions.logger.info('[prescriptionSafety] Override decisions recorded', {
        prescriptionId: scope.prescriptionId,
        transactionId: result.transactionId,
        status: result.status,
      });

      res.status(201).json({
        transactionId: result.transactionId,
        status: result.status,
        canSave: result.status === 'ready',
        unresolvedAlertIds: result.unresolvedAlertIds,
        records: result.records,
      });
    } catch (error) {
      sendError(res, error, { route: 'POST /overrides' });
    }
  });

  /**
   * GET /v1/prescription-safety/overrides?prescriptionId=...
   * Every stored override transaction for one prescription
   */
  router.get('/overrides', requireAuth, requireClinician, async (req: AuthRequest, res) => {
    try {
      const parsed = identifierSchema.safeParse(req.query.prescriptionId);
      if (!parsed.success) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'prescriptionId query parameter is required',
        });
        return;
      }

      const prescriptionId = sanitizeTerm(parsed.data);
      const transactions = await listOverrides(prescriptionId);
      res.json({ prescriptionId, transactions });
    } catch (error) {
      sendError(res, error, { route: 'GET /overrides' });
    }
  });

  /**
   * GET /v1/prescription-safety/overrides/:transactionId
   * Stored records for one override transaction, with hash-chain verification
   */
  router.get('/overrides/:transactionId', requireAuth, requireClinician, async (req: AuthRequest, res) => {
    try {
      const transactionId = identifierSchema.parse(req.params.transactionId);
      const { records, verification } = await verifyOverrides(transactionId);

      if (records.length === 0) {
        res.status(404).json({
          code: 'not_found',
          message: 'Override transaction not found',
        });
        return;
      }

      res.json({ transactionId, records, verification });
    } catch (error) {
      sendError(res, error, { route: 'GET /overrides/:transactionId' });
    }
  });

  /**
   * GET /v1/prescription-safety/override-reasons
   */
  router.get('/override-reasons', requireAuth, requireClinician, (_req: AuthRequest, res) => {
    res.json({
      reasons: [...COMMON_OVERRIDE_REASONS],
      minLength: overrideConfig.reasonMinLength,
      maxLength: overrideConfig.reasonMaxLength,
    });
  });

  return router;
}

export const prescriptionSafetyRouter = createPrescriptionSafetyRouter();
