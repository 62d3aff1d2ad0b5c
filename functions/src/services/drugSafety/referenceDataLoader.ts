import * as fs from 'fs';
import * as path from 'path';
import * as functions from 'firebase-functions';
import { referenceDataConfig } from '../../config';
import { DataLoadError } from './errors';
import { ReferenceDataStore } from './referenceDataStore';
import type { ReferenceDataSources } from './referenceSchemas';

export const REFERENCE_FILES: Record<keyof ReferenceDataSources, string> = {
  drugClasses: 'drugClasses.json',
  interactions: 'interactions.json',
  contraindications: 'contraindications.json',
  crossAllergies: 'crossAllergies.json',
};

/** Errors raised by `fs` can fail `instanceof Error` across realms. */
function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function readJsonFile(filePath: string, issues: string[]): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    issues.push(`${path.basename(filePath)}: unreadable (${errorMessage(error)})`);
    return undefined;
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    issues.push(`${path.basename(filePath)}: invalid JSON (${errorMessage(error)})`);
    return undefined;
  }
}

/**
 * Read the four reference files from `directory` and build the store.
 * Any unreadable file, JSON syntax error or validation issue is a DataLoadError.
 */
export function loadReferenceDataFromDirectory(directory: string): ReferenceDataStore {
  const issues: string[] = [];
  const sources: ReferenceDataSources = {
    drugClasses: readJsonFile(path.join(directory, REFERENCE_FILES.drugClasses), issues),
    interactions: readJsonFile(path.join(directory, REFERENCE_FILES.interactions), issues),
    contraindications: readJsonFile(path.join(directory, REFERENCE_FILES.contraindications), issues),
    crossAllergies: readJsonFile(path.join(directory, REFERENCE_FILES.crossAllergies), issues),
  };

  if (issues.length > 0) {
    throw new DataLoadError(issues);
  }

  const startedAt = Date.now();
  const store = ReferenceDataStore.load(sources);

  functions.logger.info('[referenceData] Loaded reference data', {
    directory,
    ...store.stats,
    durationMs: Date.now() - startedAt,
  });

  return store;
}

let cachedStore: ReferenceDataStore | null = null;

/**
 * Process-wide store, loaded on first use from the configured directory.
 * Failures are not cached; the instance must not serve without valid data.
 */
export function getReferenceData(): ReferenceDataStore {
  if (!cachedStore) {
    try {
      cachedStore = loadReferenceDataFromDirectory(referenceDataConfig.directory);
    } catch (error) {
      if (error instanceof DataLoadError) {
        functions.logger.error('[referenceData] Reference data failed validation', {
          directory: referenceDataConfig.directory,
          issueCount: error.issues.length,
          issues: error.issues.slice(0, 20),
        });
      }
      throw error;
    }
  }
  return cachedStore;
}

/** Test hook: drop the cached store. */
export function resetReferenceDataCache(): void {
  cachedStore = null;
}
