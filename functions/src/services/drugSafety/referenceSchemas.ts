import { z } from 'zod';
import { EVIDENCE_LEVELS, SEVERITIES } from './types';

const identifierSchema = z.string().trim().min(1);
const severitySchema = z.enum(SEVERITIES);
const evidenceSchema = z.enum(EVIDENCE_LEVELS);

export const drugClassesFileSchema = z.object({
  classes: z.array(
    z.object({
      id: identifierSchema,
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
      duplicateRisk: z.boolean().default(false),
    }),
  ),
  drugs: z.array(
    z.object({
      id: identifierSchema,
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
      classes: z.array(identifierSchema).default([]),
    }),
  ),
});

export const interactionsFileSchema = z.object({
  interactions: z.array(
    z.object({
      id: identifierSchema,
      drugs: z.tuple([identifierSchema, identifierSchema]),
      severity: severitySchema,
      mechanism: z.string().default(''),
      clinicalEffect: z.string().min(1),
      management: z.string().default(''),
      evidence: evidenceSchema.default('moderate'),
      absolute: z.boolean().default(false),
    }),
  ),
});

const qualifierSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('renal'), egfrBelow: z.number().positive() }),
  z.object({ type: z.literal('pregnancy') }),
  z.object({ type: z.literal('geriatric'), minAge: z.number().int().positive() }),
]);

export const contraindicationsFileSchema = z.object({
  conditions: z.array(
    z.object({
      id: identifierSchema,
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
    }),
  ),
  contraindications: z.array(
    z.object({
      id: identifierSchema,
      drug: identifierSchema,
      condition: identifierSchema,
      severity: severitySchema,
      reason: z.string().min(1),
      alternatives: z.array(identifierSchema).default([]),
      evidence: evidenceSchema.default('moderate'),
      absolute: z.boolean().default(false),
      qualifier: qualifierSchema.optional(),
    }),
  ),
});

export const crossAllergiesFileSchema = z.object({
  groups: z.array(
    z.object({
      id: identifierSchema,
      name: z.string().min(1),
      members: z.array(identifierSchema).min(1),
      severity: severitySchema.default('major'),
      evidence: evidenceSchema.default('moderate'),
    }),
  ),
});

export type DrugClassesFile = z.infer<typeof drugClassesFileSchema>;
export type InteractionsFile = z.infer<typeof interactionsFileSchema>;
export type ContraindicationsFile = z.infer<typeof contraindicationsFileSchema>;
export type CrossAllergiesFile = z.infer<typeof crossAllergiesFileSchema>;

/**
 * Raw (unvalidated) contents of the four reference files.
 */
export interface ReferenceDataSources {
  drugClasses: unknown;
  interactions: unknown;
  contraindications: unknown;
  crossAllergies: unknown;
}
