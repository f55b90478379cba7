/**
 * Suggestion helpers
 * Pure functions turning an error into a next step for the user.
 */

import {
  ParseError,
  ShapeError,
  ValidationError,
  type ConfsmithError,
} from '../types/errors.js';

/**
 * Simple edit-distance-like function. Not full Levenshtein: positional char
 * differences plus the absolute length delta. Good enough for small typos.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (longer.length === 0) return shorter.length;
  if (shorter.length === 0) return longer.length;

  let distance = Math.abs(a.length - b.length);
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Return up to 3 close matches for a misspelt string.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(input, option),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}

/**
 * Next steps for an error, most specific first. Suggestions set on the error
 * itself win.
 */
export function suggestFor(error: ConfsmithError): string[] {
  if (error.suggestions && error.suggestions.length > 0) {
    return error.suggestions;
  }

  if (error instanceof ValidationError) {
    const missing = error.failures
      .filter((failure) => failure.keyword === 'required')
      .map((failure) => failure.params?.missingProperty)
      .filter((name): name is string => typeof name === 'string');
    if (missing.length > 0) {
      return [
        `Set ${missing.map((name) => `"${name}"`).join(', ')} in the config, or give the schema a default for it`,
      ];
    }
    return [];
  }

  if (error instanceof ShapeError) {
    return ['Give every extra key of this mapping a mapping value'];
  }

  if (error instanceof ParseError) {
    const { line } = error.context ?? {};
    return typeof line === 'number'
      ? [`Check the YAML syntax around line ${line}`]
      : ['Check the YAML syntax'];
  }

  const suggestion = error.context?.suggestion;
  return typeof suggestion === 'string' ? [suggestion] : [];
}
