/**
 * Common medication salts/formulations to strip
 */
const SALT_SUFFIXES = [
  'succinate',
  'tartrate',
  'hydrochloride',
  'hcl',
  'sulfate',
  'sodium',
  'potassium',
  'calcium',
  'maleate',
  'fumarate',
  'acetate',
  'phosphate',
  'citrate',
  'besylate',
  'mesylate',
  'er',
  'xl',
  'xr',
  'sr',
  'cr',
  'la',
  'cd',
  'dr',
  'odt',
];

const SALT_SUFFIX_PATTERNS = SALT_SUFFIXES.map((suffix) => new RegExp(`\\s+${suffix}$`));

// "500 mg", "0.125mg", "10 units", "2.5 mg/ml"
const STRENGTH_PATTERN = /\s+\d+(?:\.\d+)?\s*(?:mg|mcg|g|ml|units?|iu|%)(?:\/\w+)?$/;

/**
 * Case-insensitive, whitespace-collapsed key used by every reference index.
 */
export function toLookupKey(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Strip trailing dose strengths, salt names and release designations
 * ("metoprolol succinate er 50 mg" -> "metoprolol").
 */
export function stripFormulation(key: string): string {
  let current = key;
  let previous = '';

  while (current !== previous) {
    previous = current;
    current = current.replace(STRENGTH_PATTERN, '').trim();
    for (const pattern of SALT_SUFFIX_PATTERNS) {
      if (pattern.test(current)) {
        current = current.replace(pattern, '').trim();
        break;
      }
    }
  }

  return current;
}

/**
 * Keys an identifier or alias is reachable under. Hyphens and underscores
 * in ids also match their spaced spelling ("amoxicillin clavulanate", "ckd stage4").
 */
export function keyVariants(value: string): string[] {
  const key = toLookupKey(value);
  const spaced = toLookupKey(key.replace(/[-_]/g, ' '));
  return spaced === key ? [key] : [key, spaced];
}
