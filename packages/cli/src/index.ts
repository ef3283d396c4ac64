#!/usr/bin/env node
import { runCli } from './runtime';

runCli().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    console.error('[pine-cli] fatal error', err);
    process.exitCode = 1;
  },
);
