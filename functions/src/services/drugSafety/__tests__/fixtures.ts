import * as path from 'path';
import { loadReferenceDataFromDirectory } from '../referenceDataLoader';
import type { ReferenceDataStore } from '../referenceDataStore';
import type { Alert, PatientDemographics, PrescriptionCheckRequest } from '../types';

export const BUNDLED_REFERENCE_DIR = path.resolve(__dirname, '../../../../data/reference');

let bundledStore: ReferenceDataStore | null = null;

export function loadBundledStore(): ReferenceDataStore {
  if (!bundledStore) {
    bundledStore = loadReferenceDataFromDirectory(BUNDLED_REFERENCE_DIR);
  }
  return bundledStore;
}

export const adultPatient: PatientDemographics = { age: 58, gender: 'male' };

export function buildRequest(overrides: Partial<PrescriptionCheckRequest> = {}): PrescriptionCheckRequest {
  return {
    newDrugs: [],
    currentDrugs: [],
    conditions: [],
    allergies: [],
    patient: adultPatient,
    ...overrides,
  };
}

export function buildAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'contraindication:metformin:ckd_stage4',
    kind: 'contraindication',
    severity: 'critical',
    title: 'Contraindication: Metformin in Chronic kidney disease stage 4',
    message: 'Metformin accumulates when eGFR falls below 30 mL/min',
    details: {
      alternatives: ['linagliptin'],
      ruleIds: ['ci-001'],
      drugs: ['metformin'],
      condition: 'ckd_stage4',
    },
    canOverride: true,
    overrideRequiresReason: true,
    informational: false,
    ...overrides,
  };
}

/** Small, valid dataset; tests break one piece at a time. */
export function minimalSources() {
  return {
    drugClasses: {
      classes: [
        { id: 'nsaid', name: 'NSAIDs', duplicateRisk: true },
        { id: 'anticoagulant', name: 'Anticoagulants', duplicateRisk: true },
        { id: 'analgesic', name: 'Analgesics', duplicateRisk: false },
      ],
      drugs: [
        { id: 'warfarin', name: 'Warfarin', aliases: ['coumadin'], classes: ['anticoagulant'] },
        { id: 'ibuprofen', name: 'Ibuprofen', aliases: ['advil'], classes: ['nsaid'] },
        { id: 'acetaminophen', name: 'Acetaminophen', aliases: ['tylenol'], classes: ['analgesic'] },
      ],
    },
    interactions: {
      interactions: [
        {
          id: 'ddi-1',
          drugs: ['anticoagulant', 'nsaid'],
          severity: 'major',
          mechanism: 'Additive effects on hemostasis',
          clinicalEffect: 'Increased bleeding risk',
          management: 'Avoid combination',
          evidence: 'high',
        },
      ],
    },
    contraindications: {
      conditions: [{ id: 'gi_bleed', name: 'GI bleed' }],
      contraindications: [
        {
          id: 'ci-1',
          drug: 'nsaid',
          condition: 'gi_bleed',
          severity: 'critical',
          reason: 'NSAIDs worsen active bleeding',
          alternatives: ['acetaminophen'],
        },
      ],
    },
    crossAllergies: {
      groups: [{ id: 'nsaid-hypersensitivity', name: 'NSAID hypersensitivity', members: ['nsaid'] }],
    },
  };
}
