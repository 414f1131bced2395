#!/usr/bin/env tsx
import { createCliContext } from "./context.js";
import { runCli } from "./program.js";

process.exitCode = await runCli(
  process.argv.slice(2),
  {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
  },
  (globals) => createCliContext(globals),
);
