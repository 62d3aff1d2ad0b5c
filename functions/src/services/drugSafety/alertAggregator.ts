/**
 * Alert Aggregator
 *
 * Turns raw evaluator findings into the ordered alert list callers render:
 * 1. Group findings by alert identity (kind + drug pair / drug-condition / class)
 * 2. Keep the most severe finding per identity, merging guidance from duplicates
 * 3. Sort by severity, then kind priority, then id
 * 4. Decide override eligibility
 */

import {
  Alert,
  AlertDetails,
  AlertKind,
  compareEvidence,
  compareSeverity,
  EvidenceLevel,
  RawFinding,
  Severity,
} from './types';

const KIND_PRIORITY: Record<AlertKind, number> = {
  interaction: 0,
  contraindication: 1,
  allergy: 2,
  cross_allergy: 2,
  duplicate_therapy: 3,
  renal: 4,
  pregnancy: 4,
  geriatric: 4,
  unrecognized: 5,
};

const REASON_REQUIRED_KINDS: ReadonlySet<AlertKind> = new Set(['contraindication', 'renal', 'pregnancy']);

const UNRECOGNIZED_TITLES = {
  drug: 'Unrecognized Medication',
  condition: 'Unrecognized Condition',
  allergy: 'Unrecognized Allergy',
  screening: 'Safety Screening Incomplete',
} as const;

export function alertIdFor(finding: RawFinding): string {
  switch (finding.kind) {
    case 'interaction': {
      const ids = finding.drugs.map((drug) => drug.canonicalId).sort();
      return `interaction:${ids.join('+')}`;
    }
    case 'contraindication':
    case 'renal':
    case 'pregnancy':
    case 'geriatric':
      return `${finding.kind}:${finding.drug.canonicalId}:${finding.condition.id}`;
    case 'allergy':
    case 'cross_allergy':
      return `${finding.kind}:${finding.drug.canonicalId}:${finding.allergen}`;
    case 'duplicate_therapy':
      return `duplicate_therapy:${finding.classTag.id}`;
    case 'unrecognized':
      return `unrecognized:${finding.subject}:${finding.lookupKey}`;
  }
}

const ruleIdOf = (finding: RawFinding): string | undefined => ('ruleId' in finding ? finding.ruleId : undefined);

const evidenceOf = (finding: RawFinding): EvidenceLevel | undefined =>
  'evidence' in finding ? finding.evidence : undefined;

const isAbsolute = (finding: RawFinding): boolean => ('absolute' in finding ? finding.absolute : false);

/** Mechanism text, or the stated reason for rules without one. */
const rationaleOf = (finding: RawFinding): string | undefined => {
  if (finding.kind === 'interaction') return finding.mechanism;
  if ('reason' in finding) return finding.reason;
  return undefined;
};

const managementOf = (finding: RawFinding): string | undefined =>
  finding.kind === 'interaction' && finding.management ? finding.management : undefined;

const alternativesOf = (finding: RawFinding): string[] => ('alternatives' in finding ? finding.alternatives : []);

/** Last-resort ordering between findings that share an alert identity. */
function tieKeyOf(finding: RawFinding): string {
  switch (finding.kind) {
    case 'interaction':
      return [finding.ruleId, ...finding.drugs.map((drug) => drug.rawName)].join('|');
    case 'contraindication':
    case 'renal':
    case 'pregnancy':
    case 'geriatric':
      return [finding.ruleId, finding.drug.rawName].join('|');
    case 'allergy':
      return [finding.allergenName, finding.drug.rawName].join('|');
    case 'cross_allergy':
      return [
        finding.group.id,
        finding.allergenMember,
        finding.drugMember,
        finding.allergenName,
        finding.drug.rawName,
      ].join('|');
    case 'duplicate_therapy':
      return finding.drugs.map((drug) => drug.rawName).join('|');
    case 'unrecognized':
      return finding.rawValue;
  }
}

/** Negative when `a` should win over `b`. */
function compareFindings(a: RawFinding, b: RawFinding): number {
  const bySeverity = compareSeverity(b.severity, a.severity);
  if (bySeverity !== 0) return bySeverity;

  const evidenceA = evidenceOf(a);
  const evidenceB = evidenceOf(b);
  if (evidenceA && evidenceB) {
    const byEvidence = compareEvidence(evidenceB, evidenceA);
    if (byEvidence !== 0) return byEvidence;
  }

  return tieKeyOf(a).localeCompare(tieKeyOf(b));
}

function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

function namesForTitle(finding: RawFinding): string {
  switch (finding.kind) {
    case 'interaction':
      return [...finding.drugs]
        .sort((a, b) => a.canonicalId.localeCompare(b.canonicalId))
        .map((drug) => drug.displayName)
        .join(' + ');
    case 'duplicate_therapy':
      return finding.classTag.name;
    case 'unrecognized':
      return finding.rawValue;
    default:
      return finding.drug.displayName;
  }
}

function titleFor(finding: RawFinding): string {
  const subject = namesForTitle(finding);
  switch (finding.kind) {
    case 'interaction':
      return `Drug Interaction: ${subject}`;
    case 'contraindication':
      return `Contraindication: ${subject} in ${finding.condition.name}`;
    case 'renal':
      return `Renal Dose Adjustment Needed: ${subject}`;
    case 'pregnancy':
      return `Pregnancy Contraindication: ${subject}`;
    case 'geriatric':
      return `Potentially Inappropriate in Older Adults: ${subject}`;
    case 'allergy':
      return `Allergy: ${subject}`;
    case 'cross_allergy':
      return `Cross-Allergy Risk: ${subject}`;
    case 'duplicate_therapy':
      return `Duplicate Therapy: ${subject}`;
    case 'unrecognized':
      return `${UNRECOGNIZED_TITLES[finding.subject]}: ${subject}`;
  }
}

function messageFor(finding: RawFinding): string {
  switch (finding.kind) {
    case 'interaction':
      return finding.clinicalEffect;
    case 'contraindication':
    case 'renal':
    case 'pregnancy':
    case 'geriatric':
      return finding.reason;
    case 'allergy':
      return `Patient has a documented allergy to ${finding.allergenName}.`;
    case 'cross_allergy':
      return `${finding.drug.displayName} belongs to the ${finding.group.name} group, which may cross-react with the documented ${finding.allergenName} allergy.`;
    case 'duplicate_therapy':
      return finding.sameDrug
        ? `${finding.classTag.name} is listed more than once.`
        : `${finding.drugs.map((drug) => drug.displayName).join(', ')} share the ${finding.classTag.name} class.`;
    case 'unrecognized':
      return finding.subject === 'screening'
        ? `The ${finding.rawValue} check could not be completed. Review manually.`
        : `No safety reference data is available for "${finding.rawValue}". Review manually.`;
  }
}

function detailsFor(winner: RawFinding, group: readonly RawFinding[]): AlertDetails {
  const rationale = rationaleOf(winner);
  const agreeing = group.filter((finding) => rationaleOf(finding) === rationale);

  const management = uniqueInOrder(
    agreeing.map(managementOf).filter((value): value is string => value !== undefined),
  ).join(' ');

  const details: AlertDetails = {
    alternatives: uniqueInOrder(agreeing.flatMap(alternativesOf)),
    ruleIds: uniqueInOrder(
      group.map(ruleIdOf).filter((value): value is string => value !== undefined),
    ).sort(),
    drugs: [],
  };

  const evidence = evidenceOf(winner);
  if (evidence) details.evidence = evidence;
  if (management) details.management = management;

  switch (winner.kind) {
    case 'interaction':
      details.mechanism = winner.mechanism;
      details.drugs = winner.drugs.map((drug) => drug.canonicalId).sort();
      break;
    case 'contraindication':
    case 'renal':
    case 'pregnancy':
    case 'geriatric':
      details.drugs = [winner.drug.canonicalId];
      details.condition = winner.condition.id;
      if (winner.threshold) details.threshold = { ...winner.threshold };
      break;
    case 'allergy':
      details.drugs = [winner.drug.canonicalId];
      details.allergen = winner.allergen;
      break;
    case 'cross_allergy':
      details.drugs = [winner.drug.canonicalId];
      details.allergen = winner.allergen;
      details.group = winner.group.id;
      break;
    case 'duplicate_therapy':
      details.drugs = winner.drugs.map((drug) => drug.canonicalId);
      details.classTag = winner.classTag.id;
      break;
    case 'unrecognized':
      break;
  }

  return details;
}

function toAlert(id: string, findings: readonly RawFinding[]): Alert {
  const group = [...findings].sort(compareFindings);
  const [winner] = group;
  const severity: Severity = winner.severity;

  if (winner.kind === 'unrecognized') {
    return {
      id,
      kind: winner.kind,
      severity,
      title: titleFor(winner),
      message: messageFor(winner),
      details: detailsFor(winner, group),
      canOverride: true,
      overrideRequiresReason: false,
      informational: true,
    };
  }

  const canOverride = !group.some(isAbsolute);
  return {
    id,
    kind: winner.kind,
    severity,
    title: titleFor(winner),
    message: messageFor(winner),
    details: detailsFor(winner, group),
    canOverride,
    overrideRequiresReason: severity === 'critical' || REASON_REQUIRED_KINDS.has(winner.kind) || !canOverride,
    informational: false,
  };
}

export function compareAlerts(a: Alert, b: Alert): number {
  const bySeverity = compareSeverity(b.severity, a.severity);
  if (bySeverity !== 0) return bySeverity;

  const byKind = KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind];
  if (byKind !== 0) return byKind;

  return a.id.localeCompare(b.id);
}

/**
 * Merge findings into one alert per identity and order them. The result does
 * not depend on the order findings arrive in.
 */
export function aggregate(findings: readonly RawFinding[]): Alert[] {
  const groups = new Map<string, RawFinding[]>();
  for (const finding of findings) {
    const id = alertIdFor(finding);
    const group = groups.get(id);
    if (group) {
      group.push(finding);
    } else {
      groups.set(id, [finding]);
    }
  }

  return [...groups.entries()].map(([id, group]) => toAlert(id, group)).sort(compareAlerts);
}

/** Alerts the save path cannot pass without an override record. */
export const isBlockingAlert = (alert: Alert): boolean =>
  !alert.informational && (alert.overrideRequiresReason || !alert.canOverride);
