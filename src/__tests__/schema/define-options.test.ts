// src/__tests__/schema/define-options.test.ts

import { describe, it, expect } from 'vitest';
import { defineOptions } from '../../schema/define-options.js';
import { OptionsRegistry } from '../../schema/options-registry.js';
import { SchemaError } from '../../utils/errors.js';

describe('defineOptions', () => {
  describe('registration', () => {
    it('should register primary and short flags for every declared field', () => {
      class RunOptions {
        filename = '';
        iterations = 0;
        help = false;
      }

      const registry = defineOptions(RunOptions, {
        filename: { flag: '--filename' },
        iterations: { flag: '--iterations', short: '-i', type: 'integer' },
        help: { flag: '--help', short: '-h' },
      });

      expect(registry.flags()).toEqual(['--filename', '--iterations', '-i', '--help', '-h']);
    });

    it('should point the primary and short flag at the same field', () => {
      class CountOptions {
        count = 0;
      }

      const registry = defineOptions(CountOptions, {
        count: { flag: '--count', short: '-c', type: 'integer', help: 'How many' },
      });

      expect(registry.resolve('-c')).toBe(registry.resolve('--count'));
      expect(registry.resolve('-c').name).toBe('count');
      expect(registry.resolve('-c').valueType).toBe('integer');
      expect(registry.resolve('-c').flags).toEqual(['--count', '-c']);
      expect(registry.resolve('-c').help).toBe('How many');
    });

    it('should infer string and boolean types from the field defaults', () => {
      class InferOptions {
        name = 'anon';
        dryRun = true;
      }

      const registry = defineOptions(InferOptions, {
        name: { flag: '--name' },
        dryRun: { flag: '--dry-run' },
      });

      expect(registry.resolve('--name').valueType).toBe('string');
      expect(registry.resolve('--dry-run').valueType).toBe('boolean');
    });

    it('should ignore fields without option metadata', () => {
      class MixedOptions {
        port = 8080;
        label = 'plain';
      }

      const registry = defineOptions(MixedOptions, {
        port: { flag: '--port', type: 'integer' },
      });

      expect(registry.fields().map((f) => f.name)).toEqual(['port']);
      expect(registry.contains('--label')).toBe(false);
    });

    it('should treat an empty short flag as absent', () => {
      class ShortOptions {
        mode = 'fast';
      }

      const registry = defineOptions(ShortOptions, {
        mode: { flag: '--mode', short: '' },
      });

      expect(registry.resolve('--mode').flags).toEqual(['--mode']);
      expect(registry.contains('')).toBe(false);
    });

    it('should default help text to an empty string', () => {
      class NoHelpOptions {
        ratio = 0.5;
      }

      const registry = defineOptions(NoHelpOptions, {
        ratio: { flag: '--ratio', type: 'float' },
      });

      expect(registry.resolve('--ratio').help).toBe('');
    });

    it('should mark the class as defined', () => {
      class MarkedOptions {
        value = '';
      }

      expect(OptionsRegistry.isDefined(MarkedOptions)).toBe(false);
      defineOptions(MarkedOptions, { value: { flag: '--value' } });
      expect(OptionsRegistry.isDefined(MarkedOptions)).toBe(true);
    });
  });

  describe('schema errors', () => {
    it('should reject a class with no declared options', () => {
      class EmptyOptions {
        unused = '';
      }

      expect(() => defineOptions(EmptyOptions, {})).toThrow(SchemaError);
      expect(() => defineOptions(EmptyOptions, {})).toThrow(
        '[EmptyOptions] No options declared. A parser needs at least one flag.'
      );
    });

    it('should reject two fields claiming the same flag', () => {
      class ClashOptions {
        alpha = '';
        beta = '';
      }

      expect(() =>
        defineOptions(ClashOptions, {
          alpha: { flag: '--alpha', short: '-x' },
          beta: { flag: '--beta', short: '-x' },
        })
      ).toThrow("[ClashOptions] Flag '-x' is declared by both 'alpha' and 'beta'");
    });

    it('should reject a primary flag reused as another field\'s short flag', () => {
      class CrossClashOptions {
        alpha = '';
        beta = '';
      }

      expect(() =>
        defineOptions(CrossClashOptions, {
          alpha: { flag: '--alpha' },
          beta: { flag: '--beta', short: '--alpha' },
        })
      ).toThrow(SchemaError);
    });

    it('should reject a field using the same string as flag and short flag', () => {
      class SelfClashOptions {
        alpha = '';
      }

      expect(() =>
        defineOptions(SelfClashOptions, {
          alpha: { flag: '--alpha', short: '--alpha' },
        })
      ).toThrow("[SelfClashOptions] Option 'alpha' uses '--alpha' as both flag and short flag");
    });

    it('should reject a flag without leading dashes', () => {
      class BareOptions {
        filename = '';
      }

      expect(() =>
        defineOptions(BareOptions, {
          filename: { flag: 'filename' },
        })
      ).toThrow("[BareOptions] Invalid option 'filename': flag: flag must look like --name or -n");
    });

    it('should reject a number field whose type cannot be inferred', () => {
      class LooseOptions {
        size: number | string = 3;
      }

      expect(() =>
        defineOptions(LooseOptions, {
          size: { flag: '--size' },
        })
      ).toThrow("[LooseOptions] Option 'size' needs an explicit type ('integer' or 'float')");
    });

    it('should reject defining options twice for the same class', () => {
      class OnceOptions {
        value = '';
      }

      defineOptions(OnceOptions, { value: { flag: '--value' } });

      expect(() => defineOptions(OnceOptions, { value: { flag: '--value' } })).toThrow(
        /already defined/
      );
    });

    it('should not mark a class as defined when building fails', () => {
      class FailingOptions {
        value = '';
      }

      expect(() => defineOptions(FailingOptions, {})).toThrow(SchemaError);
      expect(OptionsRegistry.isDefined(FailingOptions)).toBe(false);
    });
  });
});
