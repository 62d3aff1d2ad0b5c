import type { RawFinding, RecognizedDrug } from '../types';
import type { ReferenceDataStore } from '../referenceDataStore';
import { isRecognized, RuleEvaluator, toFindingDrug } from './types';

function findingsForPair(store: ReferenceDataStore, a: RecognizedDrug, b: RecognizedDrug): RawFinding[] {
  // Same drug listed twice is a duplicate, not an interaction.
  if (a.canonicalId === b.canonicalId) {
    return [];
  }

  const sideA = store.expandIdentifier(a.canonicalId);
  return store.lookupInteractions(a.canonicalId, b.canonicalId).map((rule) => {
    const [first, second] = rule.drugs;
    const matchedOn: [string, string] = sideA.includes(first) ? [first, second] : [second, first];

    return {
      kind: 'interaction',
      ruleId: rule.id,
      severity: rule.severity,
      evidence: rule.evidence,
      absolute: rule.absolute,
      drugs: [toFindingDrug(a), toFindingDrug(b)],
      matchedOn,
      mechanism: rule.mechanism,
      clinicalEffect: rule.clinicalEffect,
      management: rule.management,
    };
  });
}

/**
 * Every (new, new) and (new, current) pair. Current-current pairs were
 * accepted when those drugs were prescribed and are not re-flagged.
 */
export const interactionEvaluator: RuleEvaluator = {
  name: 'interaction',
  evaluate({ store, newDrugs, currentDrugs }) {
    const added = newDrugs.filter(isRecognized);
    const existing = currentDrugs.filter(isRecognized);
    const findings: RawFinding[] = [];

    added.forEach((drug, index) => {
      for (const other of added.slice(index + 1)) {
        findings.push(...findingsForPair(store, drug, other));
      }
      for (const current of existing) {
        findings.push(...findingsForPair(store, drug, current));
      }
    });

    return findings;
  },
};
