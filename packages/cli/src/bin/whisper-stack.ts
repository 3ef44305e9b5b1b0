#!/usr/bin/env tsx
/**
 * Entry point. Works the same from a POSIX shell and from cmd/PowerShell
 * (npm generates the .cmd shim for the bin entry).
 *
 * Usage: whisper-stack start [--all] | stop | logs [service] | status [--all]
 */

import { run } from "../cli.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("whisper-stack crashed:", err);
    process.exit(1);
  });
