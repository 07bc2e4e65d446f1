// src/cli/demo-options.ts

import { defineOptions } from '../schema/define-options.js';

export class DemoOptions {
  filename = '';
  iterations = 0;
  help = false;
  // Plain field: not bindable from the command line
  createdBy = 'fieldflags-demo';
}

export const demoRegistry = defineOptions(DemoOptions, {
  filename: { flag: '--filename', help: 'File to write results to' },
  iterations: { flag: '--iterations', short: '-i', type: 'integer', help: 'Number of iterations to run' },
  help: { flag: '--help', short: '-h', help: 'Print this usage text (takes a value: true/false)' },
});
