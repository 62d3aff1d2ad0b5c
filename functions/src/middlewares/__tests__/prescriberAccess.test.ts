import * as admin from 'firebase-admin';
import type { Response } from 'express';
import { z } from 'zod';
import {
  BlockedDecisionError,
  DataLoadError,
  DrugSafetyError,
  MissingReasonError,
  SaveBlockedError,
} from '../../services/drugSafety/errors';
import { AuthRequest, hasClinicianClaim, requireAuth, requireClinician } from '../auth';
import { errorHandler, toErrorResponse } from '../errorHandler';

type FakeResponse = {
  statusCode: number;
  body: unknown;
  headersSent: boolean;
  status(code: number): FakeResponse;
  json(payload: unknown): FakeResponse;
};

function createResponse(): FakeResponse {
  return {
    statusCode: 200,
    body: undefined,
    headersSent: false,
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    json(payload: unknown) {
      this.body = payload;
      return this;
    },
  };
}

function createRequest(overrides: Record<string, unknown> = {}): AuthRequest {
  return { headers: {}, path: '/check', ...overrides } as unknown as AuthRequest;
}

const asResponse = (res: FakeResponse): Response => res as unknown as Response;

describe('requireAuth', () => {
  const authMock = admin.auth as unknown as jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('rejects requests without a bearer token', async () => {
    const res = createResponse();
    const next = jest.fn();

    await requireAuth(createRequest(), asResponse(res), next);

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ code: 'unauthorized', message: 'Missing or invalid authorization header' });
    expect(next).not.toHaveBeenCalled();
  });

  it('attaches the decoded token and continues', async () => {
    const req = createRequest({ headers: { authorization: 'Bearer test-token' } });
    const next = jest.fn();

    await requireAuth(req, asResponse(createResponse()), next);

    expect(req.user).toEqual({ uid: 'test-clinician-id', clinician: true });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('rejects tokens that fail verification', async () => {
    authMock.mockImplementationOnce(() => ({
      verifyIdToken: jest.fn(() => Promise.reject(new Error('expired'))),
    }));
    const res = createResponse();

    await requireAuth(createRequest({ headers: { authorization: 'Bearer test-token' } }), asResponse(res), jest.fn());

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ code: 'unauthorized', message: 'Invalid or expired token' });
  });
});

describe('requireClinician', () => {
  it('accepts the clinician claim or role', () => {
    expect(hasClinicianClaim(undefined)).toBe(false);
    expect(hasClinicianClaim({ uid: 'u1', clinician: true } as unknown as admin.auth.DecodedIdToken)).toBe(true);
    expect(hasClinicianClaim({ uid: 'u1', role: 'clinician' } as unknown as admin.auth.DecodedIdToken)).toBe(true);
    expect(hasClinicianClaim({ uid: 'u1', role: 'patient' } as unknown as admin.auth.DecodedIdToken)).toBe(false);
  });

  it('returns 403 for signed-in users without the claim', () => {
    const res = createResponse();
    const next = jest.fn();

    requireClinician(createRequest({ user: { uid: 'user-1' } }), asResponse(res), next);

    expect(res.statusCode).toBe(403);
    expect(res.body).toEqual({ code: 'forbidden', message: 'Clinician access required' });
    expect(next).not.toHaveBeenCalled();
  });

  it('continues for clinicians', () => {
    const next = jest.fn();

    requireClinician(createRequest({ user: { uid: 'user-1', clinician: true } }), asResponse(createResponse()), next);

    expect(next).toHaveBeenCalledTimes(1);
  });
});

describe('toErrorResponse', () => {
  it('maps validation errors to 400', () => {
    const result = z.object({ age: z.number() }).safeParse({ age: 'old' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const { status, body } = toErrorResponse(result.error);

    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'invalid_request', message: 'Invalid request body' });
  });

  it('maps override rule violations to 422 with the alert id', () => {
    expect(toErrorResponse(new MissingReasonError('renal:gabapentin:renal_impairment', 10))).toEqual({
      status: 422,
      body: {
        code: 'override_reason_required',
        message:
          'Alert renal:gabapentin:renal_impairment requires a documented override reason (at least 10 characters)',
        alertId: 'renal:gabapentin:renal_impairment',
      },
    });
    expect(toErrorResponse(new BlockedDecisionError('pregnancy:lisinopril:pregnancy'))).toMatchObject({
      status: 422,
      body: { code: 'override_blocked', alertId: 'pregnancy:lisinopril:pregnancy' },
    });
    expect(toErrorResponse(new SaveBlockedError(['a', 'b'], false))).toEqual({
      status: 422,
      body: {
        code: 'save_blocked',
        message: 'Prescription has 2 unresolved blocking alert(s)',
        unresolvedAlertIds: ['a', 'b'],
      },
    });
  });

  it('maps reference data failures to 503 without the file details', () => {
    expect(toErrorResponse(new DataLoadError(['drugClasses.json: invalid JSON (oops)']))).toEqual({
      status: 503,
      body: { code: 'data_load_failed', message: 'Drug safety reference data is unavailable' },
    });
  });

  it('keeps the code of other drug safety errors', () => {
    const { status, body } = toErrorResponse(new DrugSafetyError('audit_chain_invalid', 'broken chain'));

    expect(status).toBe(500);
    expect(body).toMatchObject({ code: 'audit_chain_invalid', message: 'broken chain' });
  });

  it('hides internals in production', () => {
    const previous = process.env.NODE_ENV;
    process.env.NODE_ENV = 'production';
    try {
      expect(toErrorResponse(new Error('db password rejected'))).toEqual({
        status: 500,
        body: { code: 'server_error', message: 'An unexpected error occurred' },
      });
    } finally {
      process.env.NODE_ENV = previous;
    }
  });
});

describe('errorHandler', () => {
  it('writes the mapped response', () => {
    const res = createResponse();

    errorHandler(new SaveBlockedError([], true), createRequest(), asResponse(res), jest.fn());

    expect(res.statusCode).toBe(422);
    expect(res.body).toEqual({
      code: 'save_blocked',
      message: 'Prescription was cancelled by the prescriber',
      unresolvedAlertIds: [],
    });
  });

  it('delegates once headers are sent', () => {
    const res = { ...createResponse(), headersSent: true };
    const next = jest.fn();
    const error = new Error('late');

    errorHandler(error, createRequest(), asResponse(res), next);

    expect(next).toHaveBeenCalledWith(error);
  });
});
