/**
 * Reference Data Store
 *
 * Validates the four reference datasets (drug classes, interactions,
 * contraindications, cross-allergy groups) and indexes them for lookup.
 *
 * Drug ids and class ids share one identifier space: rules may target either,
 * and a class-level rule matches every drug carrying that class tag.
 *
 * The store is built in one pass and frozen; a failed load never yields a
 * partially populated instance.
 */

import type { z, ZodError } from 'zod';
import { DataLoadError } from './errors';
import { keyVariants, toLookupKey } from './lookupKey';
import {
  contraindicationsFileSchema,
  crossAllergiesFileSchema,
  drugClassesFileSchema,
  interactionsFileSchema,
  ReferenceDataSources,
} from './referenceSchemas';
import type {
  ConditionReference,
  ContraindicationRule,
  CrossAllergyGroup,
  CrossAllergyMatch,
  DrugClass,
  DrugReference,
  InteractionRule,
} from './types';

export interface ReferenceDataStats {
  drugs: number;
  classes: number;
  conditions: number;
  interactions: number;
  contraindications: number;
  crossAllergyGroups: number;
}

type ReferenceIndices = {
  drugs: Map<string, DrugReference>;
  drugAliases: Map<string, string>;
  classes: Map<string, DrugClass>;
  classAliases: Map<string, string>;
  conditions: Map<string, ConditionReference>;
  conditionAliases: Map<string, string>;
  interactions: Map<string, InteractionRule>;
  interactionCount: number;
  contraindicationsByTarget: Map<string, ContraindicationRule[]>;
  contraindicationCount: number;
  groups: Map<string, CrossAllergyGroup>;
  groupsByMember: Map<string, CrossAllergyGroup[]>;
};

const pairKey = (a: string, b: string): string => (a <= b ? `${a}|${b}` : `${b}|${a}`);

function formatZodIssues(file: string, error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${file}: ${path}: ${issue.message}`;
  });
}

function parseFile<S extends z.ZodTypeAny>(
  file: string,
  schema: S,
  raw: unknown,
  issues: string[],
): z.output<S> | null {
  const result = schema.safeParse(raw);
  if (!result.success) {
    issues.push(...formatZodIssues(file, result.error));
    return null;
  }
  return result.data;
}

function pushToIndex<T>(index: Map<string, T[]>, key: string, value: T): void {
  const existing = index.get(key);
  if (existing) {
    existing.push(value);
  } else {
    index.set(key, [value]);
  }
}

function registerAliases(
  aliasIndex: Map<string, string>,
  ownerId: string,
  names: readonly string[],
  label: string,
  issues: string[],
): void {
  for (const name of names) {
    for (const key of keyVariants(name)) {
      const existing = aliasIndex.get(key);
      if (existing && existing !== ownerId) {
        issues.push(`${label}: alias "${key}" is claimed by both ${existing} and ${ownerId}`);
        continue;
      }
      aliasIndex.set(key, ownerId);
    }
  }
}

function buildIndices(sources: ReferenceDataSources): ReferenceIndices {
  const issues: string[] = [];

  const drugClassesFile = parseFile('drugClasses', drugClassesFileSchema, sources.drugClasses, issues);
  const interactionsFile = parseFile('interactions', interactionsFileSchema, sources.interactions, issues);
  const contraindicationsFile = parseFile(
    'contraindications',
    contraindicationsFileSchema,
    sources.contraindications,
    issues,
  );
  const crossAllergiesFile = parseFile('crossAllergies', crossAllergiesFileSchema, sources.crossAllergies, issues);

  if (!drugClassesFile || !interactionsFile || !contraindicationsFile || !crossAllergiesFile) {
    throw new DataLoadError(issues);
  }

  // Classes first: drugs reference them.
  const classes = new Map<string, DrugClass>();
  const classAliases = new Map<string, string>();
  for (const entry of drugClassesFile.classes) {
    if (classes.has(entry.id)) {
      issues.push(`drugClasses: duplicate class id "${entry.id}"`);
      continue;
    }
    classes.set(
      entry.id,
      Object.freeze({
        id: entry.id,
        name: entry.name,
        aliases: Object.freeze([...entry.aliases]),
        duplicateRisk: entry.duplicateRisk,
      }),
    );
    registerAliases(classAliases, entry.id, [entry.id, ...entry.aliases], 'drugClasses', issues);
  }

  const drugs = new Map<string, DrugReference>();
  const drugAliases = new Map<string, string>();
  for (const entry of drugClassesFile.drugs) {
    if (drugs.has(entry.id)) {
      issues.push(`drugClasses: duplicate drug id "${entry.id}"`);
      continue;
    }
    if (classes.has(entry.id)) {
      issues.push(`drugClasses: drug id "${entry.id}" collides with a class id`);
      continue;
    }
    for (const tag of entry.classes) {
      if (!classes.has(tag)) {
        issues.push(`drugClasses: drug "${entry.id}" references undefined class "${tag}"`);
      }
    }
    drugs.set(
      entry.id,
      Object.freeze({
        id: entry.id,
        name: entry.name,
        aliases: Object.freeze([...entry.aliases]),
        classTags: Object.freeze([...new Set(entry.classes)]),
      }),
    );
    registerAliases(drugAliases, entry.id, [entry.id, ...entry.aliases], 'drugClasses', issues);
  }

  const isDefined = (identifier: string): boolean => drugs.has(identifier) || classes.has(identifier);

  const interactions = new Map<string, InteractionRule>();
  const interactionIds = new Set<string>();
  for (const entry of interactionsFile.interactions) {
    if (interactionIds.has(entry.id)) {
      issues.push(`interactions: duplicate rule id "${entry.id}"`);
      continue;
    }
    interactionIds.add(entry.id);

    const [first, second] = entry.drugs;
    const undefinedIds = [first, second].filter((identifier) => !isDefined(identifier));
    if (undefinedIds.length > 0) {
      issues.push(`interactions: rule "${entry.id}" references undefined identifier(s) ${undefinedIds.join(', ')}`);
      continue;
    }

    const rule: InteractionRule = Object.freeze({
      id: entry.id,
      drugs: Object.freeze([first, second] as const),
      severity: entry.severity,
      mechanism: entry.mechanism,
      clinicalEffect: entry.clinicalEffect,
      management: entry.management,
      evidence: entry.evidence,
      absolute: entry.absolute,
    });

    const key = pairKey(first, second);
    const existing = interactions.get(key);
    if (existing) {
      const sameContent =
        existing.severity === rule.severity &&
        existing.mechanism === rule.mechanism &&
        existing.clinicalEffect === rule.clinicalEffect;
      issues.push(
        sameContent
          ? `interactions: rules "${existing.id}" and "${rule.id}" declare the same pair ${first}/${second}`
          : `interactions: rules "${existing.id}" and "${rule.id}" declare conflicting content for ${first}/${second} (pair must be symmetric)`,
      );
      continue;
    }
    interactions.set(key, rule);
  }

  const conditions = new Map<string, ConditionReference>();
  const conditionAliases = new Map<string, string>();
  for (const entry of contraindicationsFile.conditions) {
    if (conditions.has(entry.id)) {
      issues.push(`contraindications: duplicate condition id "${entry.id}"`);
      continue;
    }
    conditions.set(
      entry.id,
      Object.freeze({ id: entry.id, name: entry.name, aliases: Object.freeze([...entry.aliases]) }),
    );
    registerAliases(conditionAliases, entry.id, [entry.id, ...entry.aliases], 'contraindications', issues);
  }

  const contraindicationsByTarget = new Map<string, ContraindicationRule[]>();
  const contraindicationIds = new Set<string>();
  const contraindicationPairs = new Set<string>();
  let contraindicationCount = 0;
  for (const entry of contraindicationsFile.contraindications) {
    if (contraindicationIds.has(entry.id)) {
      issues.push(`contraindications: duplicate rule id "${entry.id}"`);
      continue;
    }
    contraindicationIds.add(entry.id);

    const problems: string[] = [];
    if (!isDefined(entry.drug)) {
      problems.push(`undefined drug or class "${entry.drug}"`);
    }
    if (!conditions.has(entry.condition)) {
      problems.push(`undefined condition "${entry.condition}"`);
    }
    for (const alternative of entry.alternatives) {
      if (!drugs.has(alternative)) {
        problems.push(`undefined alternative drug "${alternative}"`);
      }
    }
    const targetPair = `${entry.drug}|${entry.condition}`;
    if (contraindicationPairs.has(targetPair)) {
      problems.push(`duplicate rule for ${entry.drug}/${entry.condition}`);
    }
    if (problems.length > 0) {
      issues.push(`contraindications: rule "${entry.id}": ${problems.join('; ')}`);
      continue;
    }
    contraindicationPairs.add(targetPair);

    const rule: ContraindicationRule = Object.freeze({
      id: entry.id,
      drug: entry.drug,
      condition: entry.condition,
      severity: entry.severity,
      reason: entry.reason,
      alternatives: Object.freeze([...entry.alternatives]),
      evidence: entry.evidence,
      absolute: entry.absolute,
      ...(entry.qualifier ? { qualifier: Object.freeze({ ...entry.qualifier }) } : {}),
    });
    pushToIndex(contraindicationsByTarget, entry.drug, rule);
    contraindicationCount += 1;
  }

  const groups = new Map<string, CrossAllergyGroup>();
  const groupsByMember = new Map<string, CrossAllergyGroup[]>();
  for (const entry of crossAllergiesFile.groups) {
    if (groups.has(entry.id)) {
      issues.push(`crossAllergies: duplicate group id "${entry.id}"`);
      continue;
    }
    const undefinedMembers = entry.members.filter((member) => !isDefined(member));
    if (undefinedMembers.length > 0) {
      issues.push(`crossAllergies: group "${entry.id}" references undefined member(s) ${undefinedMembers.join(', ')}`);
      continue;
    }
    const group: CrossAllergyGroup = Object.freeze({
      id: entry.id,
      name: entry.name,
      members: Object.freeze([...new Set(entry.members)]),
      severity: entry.severity,
      evidence: entry.evidence,
    });
    groups.set(entry.id, group);
    for (const member of group.members) {
      pushToIndex(groupsByMember, member, group);
    }
  }

  if (issues.length > 0) {
    throw new DataLoadError(issues);
  }

  return {
    drugs,
    drugAliases,
    classes,
    classAliases,
    conditions,
    conditionAliases,
    interactions,
    interactionCount: interactions.size,
    contraindicationsByTarget,
    contraindicationCount,
    groups,
    groupsByMember,
  };
}

export class ReferenceDataStore {
  private constructor(private readonly indices: ReferenceIndices) {
    Object.freeze(this);
  }

  /**
   * Validate and index the four reference datasets.
   * Throws DataLoadError listing every problem found.
   */
  static load(sources: ReferenceDataSources): ReferenceDataStore {
    return new ReferenceDataStore(buildIndices(sources));
  }

  get stats(): ReferenceDataStats {
    return {
      drugs: this.indices.drugs.size,
      classes: this.indices.classes.size,
      conditions: this.indices.conditions.size,
      interactions: this.indices.interactionCount,
      contraindications: this.indices.contraindicationCount,
      crossAllergyGroups: this.indices.groups.size,
    };
  }

  getDrug(id: string): DrugReference | undefined {
    return this.indices.drugs.get(id);
  }

  getClass(id: string): DrugClass | undefined {
    return this.indices.classes.get(id);
  }

  getCondition(id: string): ConditionReference | undefined {
    return this.indices.conditions.get(id);
  }

  getCrossAllergyGroup(id: string): CrossAllergyGroup | undefined {
    return this.indices.groups.get(id);
  }

  findDrugIdByKey(key: string): string | undefined {
    return this.indices.drugAliases.get(key);
  }

  findClassIdByKey(key: string): string | undefined {
    return this.indices.classAliases.get(key);
  }

  findConditionIdByKey(key: string): string | undefined {
    return this.indices.conditionAliases.get(key);
  }

  findCrossAllergyGroupIdByKey(key: string): string | undefined {
    for (const group of this.indices.groups.values()) {
      if (keyVariants(group.id).includes(key) || toLookupKey(group.name) === key) {
        return group.id;
      }
    }
    return undefined;
  }

  /**
   * The identifier itself plus the class tags it carries (one hop).
   */
  expandIdentifier(id: string): string[] {
    const drug = this.indices.drugs.get(id);
    return drug ? [id, ...drug.classTags] : [id];
  }

  listDrugIds(): string[] {
    return [...this.indices.drugs.keys()];
  }

  /** Every interaction rule, in declaration order. */
  allInteractions(): InteractionRule[] {
    return [...this.indices.interactions.values()];
  }

  /**
   * Interaction rules that apply to the pair, matched on literal ids or any
   * class tag either drug carries. Order of the arguments does not matter.
   */
  lookupInteractions(idA: string, idB: string): InteractionRule[] {
    const sideA = this.expandIdentifier(idA);
    const sideB = this.expandIdentifier(idB);
    const matches = new Map<string, InteractionRule>();

    for (const a of sideA) {
      for (const b of sideB) {
        const rule = this.indices.interactions.get(pairKey(a, b));
        if (rule) {
          matches.set(rule.id, rule);
        }
      }
    }

    return [...matches.values()].sort((left, right) => left.id.localeCompare(right.id));
  }

  /**
   * Contraindication rules for the drug (or its class tags) against any
   * condition in the set.
   */
  lookupContraindications(id: string, conditions: ReadonlySet<string>): ContraindicationRule[] {
    return this.contraindicationsFor(id).filter((rule) => conditions.has(rule.condition));
  }

  /**
   * Rules carrying a renal/pregnancy/geriatric qualifier for the drug,
   * regardless of the patient's condition list.
   */
  lookupQualifiedContraindications(id: string): ContraindicationRule[] {
    return this.contraindicationsFor(id).filter((rule) => rule.qualifier !== undefined);
  }

  /**
   * Cross-allergy groups linking the drug to any declared allergen.
   *
   * A drug matches when its id or one of its class tags is a member of a group
   * that also contains the allergen (or one of the allergen's class tags).
   * An allergen may also name a group directly.
   */
  lookupCrossAllergy(id: string, allergens: Iterable<string>): CrossAllergyMatch[] {
    const drugSide = this.expandIdentifier(id);
    const matches: CrossAllergyMatch[] = [];
    const seen = new Set<string>();

    for (const allergen of allergens) {
      const candidates: Array<{ group: CrossAllergyGroup; allergenMember: string }> = [];
      const directGroup = this.indices.groups.get(allergen);
      if (directGroup) {
        candidates.push({ group: directGroup, allergenMember: allergen });
      }
      for (const allergenId of this.expandIdentifier(allergen)) {
        for (const group of this.indices.groupsByMember.get(allergenId) ?? []) {
          candidates.push({ group, allergenMember: allergenId });
        }
      }

      for (const { group, allergenMember } of candidates) {
        const matchKey = `${allergen}|${group.id}`;
        if (seen.has(matchKey)) {
          continue;
        }
        const drugMember = drugSide.find((identifier) => group.members.includes(identifier));
        if (drugMember) {
          seen.add(matchKey);
          matches.push({ group, allergen, drugMember, allergenMember });
        }
      }
    }

    return matches;
  }

  private contraindicationsFor(id: string): ContraindicationRule[] {
    const rules: ContraindicationRule[] = [];
    for (const identifier of this.expandIdentifier(id)) {
      rules.push(...(this.indices.contraindicationsByTarget.get(identifier) ?? []));
    }
    return rules.sort((left, right) => left.id.localeCompare(right.id));
  }
}
