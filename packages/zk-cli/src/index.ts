#!/usr/bin/env node
import { runCli } from './cli';

runCli()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    console.error('[zkq] fatal error', err);
    process.exitCode = 1;
  });
