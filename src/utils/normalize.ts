/**
 * Canonical normalization utilities.
 *
 * SINGLE SOURCE OF TRUTH for city-name comparison.
 * Caller-supplied names and RegionName cells both go through normalizeCity.
 */

/**
 * Normalize a city name to its comparison form.
 *
 * @param city - Raw city string from the command line or a CSV cell
 * @returns Trimmed, lowercase string with internal whitespace runs collapsed
 *
 * Examples:
 *   normalizeCity('Austin')               → 'austin'
 *   normalizeCity('  College\tStation ')  → 'college station'
 *   normalizeCity('SAN   MARCOS')         → 'san marcos'
 */
export const normalizeCity = (city: string): string => {
  return city.trim().replace(/\s+/g, ' ').toLowerCase();
};

/**
 * Known misspellings of caller input, keyed and valued in normalized form.
 * Only applied to requested names, never to data cells.
 */
export const CITY_CORRECTIONS: Readonly<Record<string, string>> = {
  'san marcoc': 'san marcos'
};

export const correctCity = (
  normalized: string,
  corrections: Readonly<Record<string, string>> = CITY_CORRECTIONS
): string => {
  return Object.prototype.hasOwnProperty.call(corrections, normalized) ? corrections[normalized] : normalized;
};
