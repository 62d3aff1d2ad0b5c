import { Request, Response, NextFunction } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';

export interface AuthRequest extends Request {
  user?: admin.auth.DecodedIdToken;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/;

/**
 * Verify the Firebase ID token; revoked tokens are rejected.
 */
export async function requireAuth(
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> {
  const match = BEARER_PATTERN.exec(req.headers.authorization ?? '');
  if (!match) {
    res.status(401).json({
      code: 'unauthorized',
      message: 'Missing or invalid authorization header',
    });
    return;
  }

  try {
    req.user = await admin.auth().verifyIdToken(match[1], true);
  } catch (error) {
    functions.logger.warn('[auth] Token verification failed', {
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(401).json({
      code: 'unauthorized',
      message: 'Invalid or expired token',
    });
    return;
  }

  next();
}

/**
 * Prescribers carry a `clinician: true` custom claim (or `role: 'clinician'`).
 */
export function hasClinicianClaim(user: admin.auth.DecodedIdToken | undefined): boolean {
  if (!user) {
    return false;
  }
  return user.clinician === true || user.role === 'clinician';
}

export function requireClinician(req: AuthRequest, res: Response, next: NextFunction): void {
  if (!hasClinicianClaim(req.user)) {
    functions.logger.warn('[auth] Rejected non-clinician request', {
      uid: req.user?.uid ?? null,
      path: req.path,
    });
    res.status(403).json({
      code: 'forbidden',
      message: 'Clinician access required',
    });
    return;
  }
  next();
}
