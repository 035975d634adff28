#!/usr/bin/env node
/**
 * kube-relay executable
 */

import { runCli } from '../cli/cli';

runCli(process.argv.slice(2))
  .then((code) => {
    // Port-forward websockets keep the event loop alive; exit explicitly.
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('❌ Unexpected error:', error);
    process.exit(1);
  });
