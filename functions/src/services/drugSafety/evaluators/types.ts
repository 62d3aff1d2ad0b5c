import type { ReferenceDataStore } from '../referenceDataStore';
import type {
  FindingDrug,
  NormalizedAllergen,
  NormalizedCondition,
  NormalizedDrug,
  PatientDemographics,
  RawFinding,
  RecognizedDrug,
} from '../types';

export interface EvaluationContext {
  store: ReferenceDataStore;
  newDrugs: readonly NormalizedDrug[];
  currentDrugs: readonly NormalizedDrug[];
  conditions: readonly NormalizedCondition[];
  allergies: readonly NormalizedAllergen[];
  patient: PatientDemographics;
}

/**
 * Shared capability of every rule evaluator. Evaluators are pure: they read
 * the context and the store and return findings, nothing else.
 */
export interface RuleEvaluator {
  readonly name: string;
  evaluate(context: EvaluationContext): RawFinding[];
}

export const isRecognized = (drug: NormalizedDrug): drug is RecognizedDrug => drug.status === 'recognized';

export const toFindingDrug = (drug: RecognizedDrug): FindingDrug => ({
  rawName: drug.rawName,
  canonicalId: drug.canonicalId,
  displayName: drug.displayName,
});
