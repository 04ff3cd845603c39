#!/usr/bin/env node

import { describeError } from '@tracemark/types';

import { setColorsEnabled } from './format';
import { run } from './index';

if (!process.stdout.isTTY || process.env['NO_COLOR'] !== undefined) {
  setColorsEnabled(false);
}

run(process.argv.slice(2)).then(
  (result) => {
    if (result.stdout.length > 0) process.stdout.write(`${result.stdout}\n`);
    if (result.stderr.length > 0) process.stderr.write(`${result.stderr}\n`);
    process.exitCode = result.exitCode;
  },
  (err: unknown) => {
    process.stderr.write(`Error: ${describeError(err)}\n`);
    process.exitCode = 1;
  },
);
