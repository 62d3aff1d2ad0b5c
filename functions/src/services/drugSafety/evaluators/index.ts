import { contraindicationEvaluator } from './contraindicationEvaluator';
import { coverageEvaluator } from './coverageEvaluator';
import { crossAllergyEvaluator } from './crossAllergyEvaluator';
import { duplicateTherapyEvaluator } from './duplicateTherapyEvaluator';
import { interactionEvaluator } from './interactionEvaluator';
import type { RuleEvaluator } from './types';

export type { EvaluationContext, RuleEvaluator } from './types';
export { qualifierThresholdMet } from './contraindicationEvaluator';
export {
  contraindicationEvaluator,
  coverageEvaluator,
  crossAllergyEvaluator,
  duplicateTherapyEvaluator,
  interactionEvaluator,
};

export const DEFAULT_EVALUATORS: readonly RuleEvaluator[] = [
  interactionEvaluator,
  contraindicationEvaluator,
  crossAllergyEvaluator,
  duplicateTherapyEvaluator,
  coverageEvaluator,
];
