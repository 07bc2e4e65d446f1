// src/utils/error-factory.ts

import { ArgumentError, type ArgumentErrorKind } from './errors.js';

export interface ParseErrorDetails {
  kind: ArgumentErrorKind | 'internal';
  message: string;
  position?: number;
  timestamp: string;
  suggestion?: string;
}

/** Anything that can list its registered flags, usually an OptionsRegistry. */
export interface FlagSource {
  flags(): readonly string[];
}

// Largest edit distance still offered as a "did you mean"
const MAX_SUGGESTION_DISTANCE = 3;

export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }

  return previous[b.length];
}

export class ErrorFactory {
  static describe(error: unknown, registry?: FlagSource): ParseErrorDetails {
    if (!(error instanceof ArgumentError)) {
      return {
        kind: 'internal',
        message: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString()
      };
    }

    const details: ParseErrorDetails = {
      kind: error.kind,
      message: error.message,
      position: error.position,
      timestamp: new Date().toISOString()
    };

    const suggestion = this.getSuggestion(error, registry);
    if (suggestion) {
      details.suggestion = suggestion;
    }

    return details;
  }

  static closestFlag(flag: string, candidates: readonly string[]): string | undefined {
    let best: string | undefined;
    let bestDistance = MAX_SUGGESTION_DISTANCE + 1;

    for (const candidate of candidates) {
      const distance = editDistance(flag, candidate);
      if (distance < bestDistance) {
        best = candidate;
        bestDistance = distance;
      }
    }

    return best;
  }

  private static getSuggestion(error: ArgumentError, registry?: FlagSource): string | undefined {
    switch (error.kind) {
      case 'unknown-flag': {
        const closest = registry ? this.closestFlag(error.token, registry.flags()) : undefined;
        if (closest) {
          return `Did you mean '${closest}'?`;
        }
        return registry ? `Known flags: ${registry.flags().join(', ')}` : undefined;
      }
      case 'missing-value':
        return `Every flag takes a value. Pass one after '${error.token}'.`;
      case 'coercion':
        return 'Check the value against the option type shown in the usage text.';
    }
  }
}
