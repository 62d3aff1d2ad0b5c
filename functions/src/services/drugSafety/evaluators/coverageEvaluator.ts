import type { RawFinding } from '../types';
import type { RuleEvaluator } from './types';

/**
 * Informational findings for inputs the reference data does not cover, so a
 * gap in screening is visible instead of silently producing no alerts.
 */
export const coverageEvaluator: RuleEvaluator = {
  name: 'coverage',
  evaluate({ newDrugs, currentDrugs, conditions, allergies }) {
    const findings: RawFinding[] = [];

    for (const drug of [...newDrugs, ...currentDrugs]) {
      if (drug.status === 'unrecognized') {
        findings.push({
          kind: 'unrecognized',
          severity: 'minor',
          subject: 'drug',
          rawValue: drug.rawName,
          lookupKey: drug.lookupKey,
        });
      }
    }

    for (const condition of conditions) {
      if (condition.status === 'unrecognized') {
        findings.push({
          kind: 'unrecognized',
          severity: 'minor',
          subject: 'condition',
          rawValue: condition.rawId,
          lookupKey: condition.lookupKey,
        });
      }
    }

    for (const allergen of allergies) {
      if (allergen.status === 'unrecognized') {
        findings.push({
          kind: 'unrecognized',
          severity: 'minor',
          subject: 'allergy',
          rawValue: allergen.rawName,
          lookupKey: allergen.lookupKey,
        });
      }
    }

    return findings;
  },
};
