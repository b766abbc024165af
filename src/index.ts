#!/usr/bin/env node
import { EXIT_FAILURE, run } from './app.js';

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error('❌ futures bot stopped unexpectedly');
    console.error(message);
    process.exitCode = EXIT_FAILURE;
  });
