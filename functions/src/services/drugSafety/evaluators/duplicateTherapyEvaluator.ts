import type { RawFinding, RecognizedDrug } from '../types';
import { isRecognized, RuleEvaluator, toFindingDrug } from './types';

type ListedDrug = { drug: RecognizedDrug; isNew: boolean };

const byCanonicalId = (a: ListedDrug, b: ListedDrug): number =>
  a.drug.canonicalId.localeCompare(b.drug.canonicalId) || a.drug.rawName.localeCompare(b.drug.rawName);

/**
 * Two or more new-or-current drugs sharing a duplicate-risk class, or the same
 * drug listed twice. At least one of them must be new; duplicates among the
 * current list alone were already accepted.
 *
 * Severity stays moderate however many drugs share the class.
 */
export const duplicateTherapyEvaluator: RuleEvaluator = {
  name: 'duplicate_therapy',
  evaluate({ store, newDrugs, currentDrugs }) {
    const listed: ListedDrug[] = [
      ...newDrugs.filter(isRecognized).map((drug) => ({ drug, isNew: true })),
      ...currentDrugs.filter(isRecognized).map((drug) => ({ drug, isNew: false })),
    ];
    const findings: RawFinding[] = [];

    const byDrug = new Map<string, ListedDrug[]>();
    const byClass = new Map<string, Map<string, ListedDrug>>();

    for (const entry of listed) {
      const sameDrug = byDrug.get(entry.drug.canonicalId) ?? [];
      sameDrug.push(entry);
      byDrug.set(entry.drug.canonicalId, sameDrug);

      for (const tag of entry.drug.classTags) {
        if (!store.getClass(tag)?.duplicateRisk) {
          continue;
        }
        const members = byClass.get(tag) ?? new Map<string, ListedDrug>();
        // Prefer the new listing so the "at least one new" check sees it.
        const existing = members.get(entry.drug.canonicalId);
        if (!existing || (!existing.isNew && entry.isNew)) {
          members.set(entry.drug.canonicalId, entry);
        }
        byClass.set(tag, members);
      }
    }

    for (const [canonicalId, entries] of byDrug) {
      if (entries.length < 2 || !entries.some((entry) => entry.isNew)) {
        continue;
      }
      const [first] = entries;
      findings.push({
        kind: 'duplicate_therapy',
        severity: 'moderate',
        classTag: { id: canonicalId, name: first.drug.displayName },
        sameDrug: true,
        drugs: [...entries].sort(byCanonicalId).map((entry) => toFindingDrug(entry.drug)),
      });
    }

    for (const [tag, members] of byClass) {
      const entries = [...members.values()];
      if (entries.length < 2 || !entries.some((entry) => entry.isNew)) {
        continue;
      }
      const drugClass = store.getClass(tag);
      findings.push({
        kind: 'duplicate_therapy',
        severity: 'moderate',
        classTag: { id: tag, name: drugClass ? drugClass.name : tag },
        sameDrug: false,
        drugs: entries.sort(byCanonicalId).map((entry) => toFindingDrug(entry.drug)),
      });
    }

    return findings;
  },
};
