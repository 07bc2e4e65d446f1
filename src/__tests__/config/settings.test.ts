// src/__tests__/config/settings.test.ts

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_VALUE_LENGTH,
  DEFAULT_PARSER_SETTINGS,
  resolveParserSettings,
} from '../../config/settings.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('resolveParserSettings', () => {
  it('should default maxValueLength to 128', () => {
    expect(DEFAULT_MAX_VALUE_LENGTH).toBe(128);
    expect(resolveParserSettings()).toEqual({ maxValueLength: 128, defaults: undefined });
  });

  it('should apply overrides', () => {
    const defaults = new Map([['name', 'x']]);
    const settings = resolveParserSettings({ maxValueLength: 16, defaults });

    expect(settings.maxValueLength).toBe(16);
    expect(settings.defaults).toBe(defaults);
  });

  it('should not mutate the shared defaults', () => {
    resolveParserSettings({ maxValueLength: 4 });
    expect(DEFAULT_PARSER_SETTINGS.maxValueLength).toBe(128);
    expect(Object.isFrozen(DEFAULT_PARSER_SETTINGS)).toBe(true);
  });

  it('should reject non-positive or fractional lengths', () => {
    expect(() => resolveParserSettings({ maxValueLength: 0 })).toThrow(ConfigurationError);
    expect(() => resolveParserSettings({ maxValueLength: -3 })).toThrow(ConfigurationError);
    expect(() => resolveParserSettings({ maxValueLength: 1.5 })).toThrow(
      'maxValueLength must be a positive integer, got 1.5'
    );
  });
});
