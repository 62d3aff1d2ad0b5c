import type { ReferenceDataStore } from '../referenceDataStore';
import type {
  ContraindicationQualifier,
  ContraindicationRule,
  PatientDemographics,
  RawFinding,
  RecognizedDrug,
} from '../types';
import { isRecognized, RuleEvaluator, toFindingDrug } from './types';

type ThresholdValues = { egfr?: number; age?: number };

/**
 * Whether the patient's demographics or labs meet a qualifier on their own,
 * without the condition appearing in the problem list.
 */
export function qualifierThresholdMet(
  qualifier: ContraindicationQualifier,
  patient: PatientDemographics,
): ThresholdValues | null {
  switch (qualifier.type) {
    case 'renal':
      return patient.egfr !== undefined && patient.egfr < qualifier.egfrBelow ? { egfr: patient.egfr } : null;
    case 'pregnancy':
      return patient.pregnant === true ? {} : null;
    case 'geriatric':
      return patient.age >= qualifier.minAge ? { age: patient.age } : null;
  }
}

/**
 * Drop alternatives that would themselves interact with something the
 * patient already takes.
 */
function safeAlternatives(
  store: ReferenceDataStore,
  alternatives: readonly string[],
  currentIds: readonly string[],
): string[] {
  return alternatives.filter((alternative) =>
    currentIds.every((currentId) => store.lookupInteractions(alternative, currentId).length === 0),
  );
}

function toFinding(
  store: ReferenceDataStore,
  drug: RecognizedDrug,
  rule: ContraindicationRule,
  trigger: 'condition' | 'threshold',
  currentIds: readonly string[],
  threshold?: ThresholdValues,
): RawFinding {
  const condition = store.getCondition(rule.condition);
  return {
    kind: rule.qualifier ? rule.qualifier.type : 'contraindication',
    ruleId: rule.id,
    severity: rule.severity,
    evidence: rule.evidence,
    absolute: rule.absolute,
    drug: toFindingDrug(drug),
    matchedOn: rule.drug,
    condition: { id: rule.condition, name: condition ? condition.name : rule.condition },
    trigger,
    reason: rule.reason,
    alternatives: safeAlternatives(store, rule.alternatives, currentIds),
    ...(threshold && Object.keys(threshold).length > 0 ? { threshold } : {}),
  };
}

/**
 * Contraindications for each new drug against the patient's conditions, plus
 * renal/pregnancy/geriatric rules whose qualifier the demographics satisfy.
 */
export const contraindicationEvaluator: RuleEvaluator = {
  name: 'contraindication',
  evaluate({ store, newDrugs, currentDrugs, conditions, patient }) {
    const conditionIds = new Set<string>();
    for (const condition of conditions) {
      if (condition.status === 'recognized') {
        conditionIds.add(condition.id);
      }
    }
    const currentIds = currentDrugs.filter(isRecognized).map((drug) => drug.canonicalId);
    const findings: RawFinding[] = [];

    for (const drug of newDrugs.filter(isRecognized)) {
      const matchedRuleIds = new Set<string>();

      for (const rule of store.lookupContraindications(drug.canonicalId, conditionIds)) {
        matchedRuleIds.add(rule.id);
        findings.push(toFinding(store, drug, rule, 'condition', currentIds));
      }

      for (const rule of store.lookupQualifiedContraindications(drug.canonicalId)) {
        if (matchedRuleIds.has(rule.id) || !rule.qualifier) {
          continue;
        }
        const threshold = qualifierThresholdMet(rule.qualifier, patient);
        if (threshold) {
          matchedRuleIds.add(rule.id);
          findings.push(toFinding(store, drug, rule, 'threshold', currentIds, threshold));
        }
      }
    }

    return findings;
  },
};
