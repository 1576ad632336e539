#!/usr/bin/env node
import { main } from '../cli.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[Netsnap:Run] Fatal error:', error);
    process.exitCode = 2;
  },
);
