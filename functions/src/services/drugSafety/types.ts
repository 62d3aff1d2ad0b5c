/**
 * Drug Safety Types
 *
 * Shared shapes for the prescription safety engine:
 * - Reference data records (drugs, classes, rules, cross-allergy groups)
 * - Normalized inputs produced by the name normalizer
 * - Raw findings emitted by the rule evaluators
 * - Alerts returned to callers
 */

export const SEVERITIES = ['critical', 'major', 'moderate', 'minor'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const EVIDENCE_LEVELS = ['high', 'moderate', 'low'] as const;
export type EvidenceLevel = (typeof EVIDENCE_LEVELS)[number];

const SEVERITY_RANK: Record<Severity, number> = {
  critical: 3,
  major: 2,
  moderate: 1,
  minor: 0,
};

const EVIDENCE_RANK: Record<EvidenceLevel, number> = {
  high: 2,
  moderate: 1,
  low: 0,
};

/** Positive when `a` is more severe than `b`. */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/** Positive when `a` is stronger evidence than `b`. */
export function compareEvidence(a: EvidenceLevel, b: EvidenceLevel): number {
  return EVIDENCE_RANK[a] - EVIDENCE_RANK[b];
}

// =============================================================================
// Reference data
// =============================================================================

export interface DrugReference {
  readonly id: string;
  readonly name: string;
  readonly aliases: readonly string[];
  readonly classTags: readonly string[];
}

export interface DrugClass {
  readonly id: string;
  readonly name: string;
  readonly aliases: readonly string[];
  readonly duplicateRisk: boolean;
}

export interface ConditionReference {
  readonly id: string;
  readonly name: string;
  readonly aliases: readonly string[];
}

export interface InteractionRule {
  readonly id: string;
  readonly drugs: readonly [string, string];
  readonly severity: Severity;
  readonly mechanism: string;
  readonly clinicalEffect: string;
  readonly management: string;
  readonly evidence: EvidenceLevel;
  readonly absolute: boolean;
}

export type ContraindicationQualifier =
  | { readonly type: 'renal'; readonly egfrBelow: number }
  | { readonly type: 'pregnancy' }
  | { readonly type: 'geriatric'; readonly minAge: number };

export interface ContraindicationRule {
  readonly id: string;
  readonly drug: string;
  readonly condition: string;
  readonly severity: Severity;
  readonly reason: string;
  readonly alternatives: readonly string[];
  readonly evidence: EvidenceLevel;
  readonly absolute: boolean;
  readonly qualifier?: ContraindicationQualifier;
}

export interface CrossAllergyGroup {
  readonly id: string;
  readonly name: string;
  readonly members: readonly string[];
  readonly severity: Severity;
  readonly evidence: EvidenceLevel;
}

export interface CrossAllergyMatch {
  readonly group: CrossAllergyGroup;
  readonly allergen: string;
  /** Identifier on the drug side (its id or one of its class tags) found in the group. */
  readonly drugMember: string;
  /** Identifier on the allergen side that placed the allergen in the group. */
  readonly allergenMember: string;
}

// =============================================================================
// Patient context
// =============================================================================

export type Gender = 'female' | 'male' | 'other' | 'unknown';

export interface PatientDemographics {
  age: number;
  gender: Gender;
  egfr?: number;
  pregnant?: boolean;
}

export interface PrescriptionCheckRequest {
  newDrugs: string[];
  currentDrugs: string[];
  conditions: string[];
  allergies: string[];
  patient: PatientDemographics;
}

// =============================================================================
// Normalized inputs
// =============================================================================

export type NormalizedDrug =
  | {
      status: 'recognized';
      rawName: string;
      canonicalId: string;
      displayName: string;
      classTags: readonly string[];
    }
  | {
      status: 'unrecognized';
      rawName: string;
      lookupKey: string;
    };

export type RecognizedDrug = Extract<NormalizedDrug, { status: 'recognized' }>;

export type NormalizedAllergen =
  | {
      status: 'recognized';
      rawName: string;
      resolvedAs: 'drug' | 'class' | 'group';
      id: string;
      displayName: string;
    }
  | {
      status: 'unrecognized';
      rawName: string;
      lookupKey: string;
    };

export type NormalizedCondition =
  | { status: 'recognized'; rawId: string; id: string; name: string }
  | { status: 'unrecognized'; rawId: string; lookupKey: string };

// =============================================================================
// Findings
// =============================================================================

export interface FindingDrug {
  rawName: string;
  canonicalId: string;
  displayName: string;
}

export type QualifiedKind = 'renal' | 'pregnancy' | 'geriatric';

export type CoverageSubject = 'drug' | 'condition' | 'allergy' | 'screening';

export type RawFinding =
  | {
      kind: 'interaction';
      ruleId: string;
      severity: Severity;
      evidence: EvidenceLevel;
      absolute: boolean;
      drugs: [FindingDrug, FindingDrug];
      /** Rule identifiers that matched each side, literal id or class tag. */
      matchedOn: [string, string];
      mechanism: string;
      clinicalEffect: string;
      management: string;
    }
  | {
      kind: 'contraindication' | QualifiedKind;
      ruleId: string;
      severity: Severity;
      evidence: EvidenceLevel;
      absolute: boolean;
      drug: FindingDrug;
      matchedOn: string;
      condition: { id: string; name: string };
      trigger: 'condition' | 'threshold';
      reason: string;
      alternatives: string[];
      threshold?: { egfr?: number; age?: number };
    }
  | {
      kind: 'allergy';
      severity: Severity;
      evidence: EvidenceLevel;
      drug: FindingDrug;
      allergen: string;
      allergenName: string;
    }
  | {
      kind: 'cross_allergy';
      severity: Severity;
      evidence: EvidenceLevel;
      drug: FindingDrug;
      allergen: string;
      allergenName: string;
      group: { id: string; name: string };
      drugMember: string;
      allergenMember: string;
    }
  | {
      kind: 'duplicate_therapy';
      severity: 'moderate';
      /** Shared duplicate-risk class, or the drug itself when it is listed twice. */
      classTag: { id: string; name: string };
      sameDrug: boolean;
      drugs: FindingDrug[];
    }
  | {
      kind: 'unrecognized';
      severity: 'minor';
      subject: CoverageSubject;
      rawValue: string;
      lookupKey: string;
    };

export type FindingKind = RawFinding['kind'];

// =============================================================================
// Alerts
// =============================================================================

export type AlertKind = FindingKind;

export const ALERT_KINDS = [
  'interaction',
  'contraindication',
  'allergy',
  'cross_allergy',
  'duplicate_therapy',
  'renal',
  'pregnancy',
  'geriatric',
  'unrecognized',
] as const satisfies readonly AlertKind[];

export interface AlertDetails {
  mechanism?: string;
  management?: string;
  alternatives: string[];
  evidence?: EvidenceLevel;
  ruleIds: string[];
  drugs: string[];
  condition?: string;
  allergen?: string;
  group?: string;
  classTag?: string;
  threshold?: { egfr?: number; age?: number };
}

export interface Alert {
  /** Stable identity: kind plus the drug pair, drug/condition or class it concerns. */
  id: string;
  kind: AlertKind;
  severity: Severity;
  title: string;
  message: string;
  details: AlertDetails;
  canOverride: boolean;
  overrideRequiresReason: boolean;
  informational: boolean;
}

export interface CoverageReport {
  unrecognizedDrugs: string[];
  unrecognizedConditions: string[];
  unrecognizedAllergies: string[];
  failedEvaluators: string[];
}

export interface PrescriptionCheckResult {
  alerts: Alert[];
  coverage: CoverageReport;
}
