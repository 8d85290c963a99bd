#!/usr/bin/env node

import { errorMessage } from '@bftsim/types';

import { setColorsEnabled } from './format';
import { run } from './index';

if (!process.stdout.isTTY || process.env['NO_COLOR'] !== undefined) {
  setColorsEnabled(false);
}

run(process.argv.slice(2), {
  onStdout: (chunk) => process.stdout.write(chunk),
  onStderr: (chunk) => process.stderr.write(chunk),
})
  .then((result) => {
    process.exitCode = result.exitCode;
  })
  .catch((err: unknown) => {
    process.stderr.write(`${errorMessage(err)}\n`);
    process.exitCode = 1;
  });
