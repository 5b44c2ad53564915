#!/usr/bin/env tsx
import { run } from './cli';

run(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
  });
