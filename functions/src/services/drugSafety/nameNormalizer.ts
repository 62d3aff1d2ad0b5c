import { keyVariants, stripFormulation, toLookupKey } from './lookupKey';
import type { ReferenceDataStore } from './referenceDataStore';
import type { NormalizedAllergen, NormalizedCondition, NormalizedDrug } from './types';

function findByVariants(value: string, lookup: (key: string) => string | undefined): string | undefined {
  for (const key of keyVariants(value)) {
    const match = lookup(key);
    if (match) {
      return match;
    }
  }
  return undefined;
}

/**
 * Resolve a free-text drug name (brand, generic, or salt form) to its canonical id.
 * Unknown names come back as `unrecognized` rather than being dropped.
 */
export function normalizeDrugName(store: ReferenceDataStore, rawName: string): NormalizedDrug {
  const lookupKey = toLookupKey(rawName);
  const find = (key: string) => store.findDrugIdByKey(key);

  let canonicalId = lookupKey ? findByVariants(lookupKey, find) : undefined;
  if (!canonicalId && lookupKey) {
    const stripped = stripFormulation(lookupKey);
    if (stripped && stripped !== lookupKey) {
      canonicalId = findByVariants(stripped, find);
    }
  }

  const drug = canonicalId ? store.getDrug(canonicalId) : undefined;
  if (!drug) {
    return { status: 'unrecognized', rawName, lookupKey };
  }

  return {
    status: 'recognized',
    rawName,
    canonicalId: drug.id,
    displayName: drug.name,
    classTags: drug.classTags,
  };
}

/**
 * Allergies are often recorded at class level ("sulfa", "penicillins"), so class
 * names win over drug names, and cross-allergy group names are tried last.
 */
export function normalizeAllergen(store: ReferenceDataStore, rawName: string): NormalizedAllergen {
  const lookupKey = toLookupKey(rawName);
  if (!lookupKey) {
    return { status: 'unrecognized', rawName, lookupKey };
  }

  const classId = findByVariants(lookupKey, (key) => store.findClassIdByKey(key));
  const drugClass = classId ? store.getClass(classId) : undefined;
  if (drugClass) {
    return { status: 'recognized', rawName, resolvedAs: 'class', id: drugClass.id, displayName: drugClass.name };
  }

  const drug = normalizeDrugName(store, rawName);
  if (drug.status === 'recognized') {
    return { status: 'recognized', rawName, resolvedAs: 'drug', id: drug.canonicalId, displayName: drug.displayName };
  }

  const groupId = findByVariants(lookupKey, (key) => store.findCrossAllergyGroupIdByKey(key));
  const group = groupId ? store.getCrossAllergyGroup(groupId) : undefined;
  if (group) {
    return { status: 'recognized', rawName, resolvedAs: 'group', id: group.id, displayName: group.name };
  }

  return { status: 'unrecognized', rawName, lookupKey };
}

export function normalizeCondition(store: ReferenceDataStore, rawId: string): NormalizedCondition {
  const lookupKey = toLookupKey(rawId);
  const conditionId = lookupKey ? findByVariants(lookupKey, (key) => store.findConditionIdByKey(key)) : undefined;
  const condition = conditionId ? store.getCondition(conditionId) : undefined;

  if (!condition) {
    return { status: 'unrecognized', rawId, lookupKey };
  }
  return { status: 'recognized', rawId, id: condition.id, name: condition.name };
}
