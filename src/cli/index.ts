#!/usr/bin/env tsx
// ============================================================
// panelmerge — command-line entry point
// ============================================================

import { run } from './run';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 2;
  },
);
