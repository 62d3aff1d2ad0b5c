import type { NormalizedAllergen, RawFinding } from '../types';
import { isRecognized, RuleEvaluator, toFindingDrug } from './types';

type RecognizedAllergen = Extract<NormalizedAllergen, { status: 'recognized' }>;

/**
 * New drugs against the declared allergy set. A drug that is itself the
 * allergen, or carries an allergen class no cross-reacting group covers, is a
 * direct allergy; anything reached through a group is a cross-allergy.
 */
export const crossAllergyEvaluator: RuleEvaluator = {
  name: 'cross_allergy',
  evaluate({ store, newDrugs, allergies }) {
    const allergens = allergies.filter(
      (allergen): allergen is RecognizedAllergen => allergen.status === 'recognized',
    );
    if (allergens.length === 0) {
      return [];
    }

    const findings: RawFinding[] = [];

    for (const drug of newDrugs.filter(isRecognized)) {
      const direct = (allergen: RecognizedAllergen): RawFinding => ({
        kind: 'allergy',
        severity: 'critical',
        evidence: 'high',
        drug: toFindingDrug(drug),
        allergen: allergen.id,
        allergenName: allergen.rawName,
      });

      const remaining: RecognizedAllergen[] = [];
      for (const allergen of allergens) {
        if (allergen.resolvedAs === 'drug' && allergen.id === drug.canonicalId) {
          findings.push(direct(allergen));
        } else {
          remaining.push(allergen);
        }
      }

      const byId = new Map(remaining.map((allergen) => [allergen.id, allergen]));
      const grouped = new Set<string>();
      for (const match of store.lookupCrossAllergy(drug.canonicalId, byId.keys())) {
        const allergen = byId.get(match.allergen);
        grouped.add(match.allergen);
        findings.push({
          kind: 'cross_allergy',
          severity: match.group.severity,
          evidence: match.group.evidence,
          drug: toFindingDrug(drug),
          allergen: match.allergen,
          allergenName: allergen ? allergen.rawName : match.allergen,
          group: { id: match.group.id, name: match.group.name },
          drugMember: match.drugMember,
          allergenMember: match.allergenMember,
        });
      }

      // Class allergies outside every cross-reacting group.
      for (const allergen of byId.values()) {
        if (allergen.resolvedAs === 'class' && !grouped.has(allergen.id) && drug.classTags.includes(allergen.id)) {
          findings.push(direct(allergen));
        }
      }
    }

    return findings;
  },
};
