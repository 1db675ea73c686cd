#!/usr/bin/env node
/**
 * Print every bundled skill and the matchers attached to it.
 * Run with: npm run skills
 */
import { start } from '../src/bootstrap/main.js';

start().catch((err: unknown) => {
  console.error(`Failed to load skills: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
