import * as functions from 'firebase-functions';
import { DEFAULT_EVALUATORS, RuleEvaluator } from '../evaluators';
import { buildEvaluationContext, checkPrescription } from '../prescriptionCheck';
import { adultPatient, buildRequest, loadBundledStore } from './fixtures';

describe('checkPrescription', () => {
  const store = loadBundledStore();

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('reports an interaction with a current drug as one alert', () => {
    const { alerts, coverage } = checkPrescription(
      store,
      buildRequest({ newDrugs: ['warfarin'], currentDrugs: ['ibuprofen'] }),
    );

    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      id: 'interaction:ibuprofen+warfarin',
      kind: 'interaction',
      severity: 'major',
      title: 'Drug Interaction: Ibuprofen + Warfarin',
      message: 'Significantly increased bleeding risk, especially gastrointestinal bleeding',
      canOverride: true,
      overrideRequiresReason: false,
      informational: false,
    });
    expect(alerts[0].details.ruleIds).toEqual(['ddi-001', 'ddi-002']);
    expect(coverage).toEqual({
      unrecognizedDrugs: [],
      unrecognizedConditions: [],
      unrecognizedAllergies: [],
      failedEvaluators: [],
    });
  });

  it('flags metformin in advanced kidney disease', () => {
    const { alerts } = checkPrescription(
      store,
      buildRequest({ newDrugs: ['Metformin 500 mg'], conditions: ['CKD Stage 4'] }),
    );

    expect(alerts).toEqual([
      expect.objectContaining({
        id: 'contraindication:metformin:ckd_stage4',
        severity: 'critical',
        title: 'Contraindication: Metformin in Chronic kidney disease stage 4',
        overrideRequiresReason: true,
        details: expect.objectContaining({ alternatives: ['linagliptin', 'insulin-glargine'] }),
      }),
    ]);
  });

  it('flags cross-allergy from a class-level allergy', () => {
    const { alerts } = checkPrescription(
      store,
      buildRequest({ newDrugs: ['amoxicillin'], allergies: ['penicillin'] }),
    );

    expect(alerts.map((alert) => [alert.id, alert.severity])).toEqual([
      ['cross_allergy:amoxicillin:penicillin', 'major'],
    ]);
    expect(alerts[0].message).toBe(
      'Amoxicillin belongs to the Beta-lactam antibiotics group, which may cross-react with the documented penicillin allergy.',
    );
  });

  it('flags a class-level allergy outside the cross-reacting groups', () => {
    const aceInhibitor = checkPrescription(
      store,
      buildRequest({ newDrugs: ['lisinopril'], allergies: ['ACE inhibitors'] }),
    );
    const statin = checkPrescription(store, buildRequest({ newDrugs: ['atorvastatin'], allergies: ['statins'] }));

    expect(aceInhibitor.alerts).toEqual([
      expect.objectContaining({
        id: 'allergy:lisinopril:ace-inhibitor',
        kind: 'allergy',
        severity: 'critical',
        title: 'Allergy: Lisinopril',
        message: 'Patient has a documented allergy to ACE inhibitors.',
        canOverride: true,
        overrideRequiresReason: true,
      }),
    ]);
    expect(statin.alerts.map((alert) => [alert.id, alert.severity])).toEqual([
      ['allergy:atorvastatin:statin', 'critical'],
    ]);
    expect(statin.coverage.unrecognizedAllergies).toEqual([]);
  });

  it('flags duplicate therapy whichever drug is new', () => {
    const first = checkPrescription(store, buildRequest({ newDrugs: ['ibuprofen'], currentDrugs: ['naproxen'] }));
    const second = checkPrescription(store, buildRequest({ newDrugs: ['naproxen'], currentDrugs: ['ibuprofen'] }));

    expect(first.alerts).toEqual(second.alerts);
    expect(first.alerts[0]).toMatchObject({
      id: 'duplicate_therapy:nsaid',
      severity: 'moderate',
      title: 'Duplicate Therapy: NSAIDs',
      message: 'Ibuprofen, Naproxen share the NSAIDs class.',
      details: expect.objectContaining({ drugs: ['ibuprofen', 'naproxen'] }),
    });
  });

  it('flags duplicate therapy once when both drugs are new, in either order', () => {
    const first = checkPrescription(store, buildRequest({ newDrugs: ['ibuprofen', 'naproxen'] }));
    const second = checkPrescription(store, buildRequest({ newDrugs: ['naproxen', 'ibuprofen'] }));

    expect(first.alerts).toEqual(second.alerts);
    expect(first.alerts).toHaveLength(1);
    expect(first.alerts[0]).toMatchObject({
      id: 'duplicate_therapy:nsaid',
      kind: 'duplicate_therapy',
      severity: 'moderate',
      message: 'Ibuprofen, Naproxen share the NSAIDs class.',
      details: expect.objectContaining({ drugs: ['ibuprofen', 'naproxen'], classTag: 'nsaid' }),
    });
  });

  it('surfaces unrecognized drugs instead of returning no alerts', () => {
    const { alerts, coverage } = checkPrescription(store, buildRequest({ newDrugs: ['unknownbrandxyz'] }));

    expect(alerts).toEqual([
      expect.objectContaining({
        id: 'unrecognized:drug:unknownbrandxyz',
        title: 'Unrecognized Medication: unknownbrandxyz',
        informational: true,
      }),
    ]);
    expect(coverage.unrecognizedDrugs).toEqual(['unknownbrandxyz']);
  });

  it('marks absolute interactions as non-overridable', () => {
    const { alerts } = checkPrescription(
      store,
      buildRequest({ newDrugs: ['simvastatin'], currentDrugs: ['clarithromycin'] }),
    );

    expect(alerts[0]).toMatchObject({
      id: 'interaction:clarithromycin+simvastatin',
      severity: 'critical',
      canOverride: false,
      overrideRequiresReason: true,
    });
  });

  it('uses demographics for renal, geriatric and pregnancy rules', () => {
    const renal = checkPrescription(
      store,
      buildRequest({ newDrugs: ['gabapentin'], patient: { ...adultPatient, egfr: 45 } }),
    );
    const geriatric = checkPrescription(
      store,
      buildRequest({ newDrugs: ['diazepam'], patient: { age: 72, gender: 'female' } }),
    );
    const pregnancy = checkPrescription(
      store,
      buildRequest({ newDrugs: ['lisinopril'], patient: { age: 31, gender: 'female', pregnant: true } }),
    );

    expect(renal.alerts[0]).toMatchObject({
      id: 'renal:gabapentin:renal_impairment',
      severity: 'major',
      overrideRequiresReason: true,
      details: expect.objectContaining({ threshold: { egfr: 45 }, alternatives: ['pregabalin'] }),
    });
    expect(geriatric.alerts[0]).toMatchObject({ id: 'geriatric:diazepam:older_adult', severity: 'moderate' });
    expect(pregnancy.alerts[0]).toMatchObject({
      id: 'pregnancy:lisinopril:pregnancy',
      severity: 'critical',
      canOverride: false,
    });
  });

  it('orders alerts by severity across kinds', () => {
    const { alerts } = checkPrescription(
      store,
      buildRequest({
        newDrugs: ['naproxen', 'unknownbrandxyz'],
        currentDrugs: ['ibuprofen', 'warfarin'],
        conditions: ['gi_bleed'],
      }),
    );

    expect(alerts.map((alert) => alert.id)).toEqual([
      'contraindication:naproxen:gi_bleed',
      'interaction:naproxen+warfarin',
      'duplicate_therapy:nsaid',
      'unrecognized:drug:unknownbrandxyz',
    ]);
  });

  it('returns the same result for the same input', () => {
    const request = buildRequest({
      newDrugs: ['warfarin', 'amoxicillin'],
      currentDrugs: ['ibuprofen'],
      allergies: ['penicillin'],
    });

    expect(checkPrescription(store, request)).toEqual(checkPrescription(store, request));
  });

  it('keeps going when an evaluator throws', () => {
    const failing: RuleEvaluator = {
      name: 'broken',
      evaluate() {
        throw new Error('boom');
      },
    };

    const { alerts, coverage } = checkPrescription(
      store,
      buildRequest({ newDrugs: ['warfarin'], currentDrugs: ['ibuprofen'] }),
      { evaluators: [failing, ...DEFAULT_EVALUATORS], prescriptionId: 'rx-1' },
    );

    expect(alerts.map((alert) => alert.id)).toEqual([
      'interaction:ibuprofen+warfarin',
      'unrecognized:screening:broken',
    ]);
    expect(alerts[1].title).toBe('Safety Screening Incomplete: broken');
    expect(coverage.failedEvaluators).toEqual(['broken']);
    expect(functions.logger.error).toHaveBeenCalledWith(
      '[prescriptionCheck] Evaluator broken failed',
      expect.objectContaining({ prescriptionId: 'rx-1', error: 'boom' }),
    );
  });
});

describe('buildEvaluationContext', () => {
  it('deduplicates conditions and allergies but keeps every drug listing', () => {
    const context = buildEvaluationContext(
      loadBundledStore(),
      buildRequest({
        newDrugs: ['warfarin', 'warfarin'],
        conditions: ['asthma', 'asthma'],
        allergies: ['sulfa', 'sulfa'],
      }),
    );

    expect(context.newDrugs).toHaveLength(2);
    expect(context.conditions).toHaveLength(1);
    expect(context.allergies).toHaveLength(1);
  });
});
