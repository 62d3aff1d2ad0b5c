export class DrugSafetyError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'DrugSafetyError';
    this.code = code;
  }
}

/**
 * Reference data is malformed or inconsistent. Fatal at startup.
 */
export class DataLoadError extends DrugSafetyError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    const summary = issues.length === 1 ? issues[0] : `${issues.length} reference data issues`;
    super('data_load_failed', `Failed to load reference data: ${summary}`);
    this.name = 'DataLoadError';
    this.issues = [...issues];
  }
}

export class MissingReasonError extends DrugSafetyError {
  readonly alertId: string;

  constructor(alertId: string, minLength: number) {
    super(
      'override_reason_required',
      `Alert ${alertId} requires a documented override reason (at least ${minLength} characters)`,
    );
    this.name = 'MissingReasonError';
    this.alertId = alertId;
  }
}

export class BlockedDecisionError extends DrugSafetyError {
  readonly alertId: string;

  constructor(alertId: string) {
    super('override_blocked', `Alert ${alertId} cannot be overridden`);
    this.name = 'BlockedDecisionError';
    this.alertId = alertId;
  }
}

export class UnknownAlertError extends DrugSafetyError {
  readonly alertId: string;

  constructor(alertId: string) {
    super('unknown_alert', `Alert ${alertId} is not part of this prescription check`);
    this.name = 'UnknownAlertError';
    this.alertId = alertId;
  }
}

export class SaveBlockedError extends DrugSafetyError {
  readonly unresolvedAlertIds: readonly string[];

  constructor(unresolvedAlertIds: readonly string[], cancelled: boolean) {
    super(
      'save_blocked',
      cancelled
        ? 'Prescription was cancelled by the prescriber'
        : `Prescription has ${unresolvedAlertIds.length} unresolved blocking alert(s)`,
    );
    this.name = 'SaveBlockedError';
    this.unresolvedAlertIds = [...unresolvedAlertIds];
  }
}
