#!/usr/bin/env node
/**
 * index.ts - CLI entry point for plumbline
 *
 * Usage:
 *   plumbline checks run                          # verify ./agents and ./notebooks
 *   plumbline checks fix black --agents-dir ./agents
 *   plumbline logs error --project my-project
 *   plumbline ask "Why did my Dataflow job fail last night?"
 *
 * The command tree lives in cli.ts; this file only wires it to the process.
 */

// Initialize OpenTelemetry tracing before any other imports
// so the tracer provider is registered before instrumented code runs
import "./tracing";

import { runCli } from "./cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
