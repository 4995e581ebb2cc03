#!/usr/bin/env node
/**
 * Benchmark runner entry point.
 *
 * Usage: npm run bench -- --directory benchmarks --retries 2
 */

import { loadEnvironment } from "./config.js";

loadEnvironment();
const { main } = await import("./cli.js");

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
