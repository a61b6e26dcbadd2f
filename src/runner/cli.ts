#!/usr/bin/env node
// src/runner/cli.ts
//
// `quill` entry: wires runCli() to the real process.

import { createNodeIO, runCli } from "./run";

runCli(process.argv.slice(2), createNodeIO()).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e instanceof Error ? (e.stack ?? e.message) : String(e));
    process.exitCode = 1;
  }
);
