#!/usr/bin/env node
import { run } from "./cli";

run(process.argv.slice(2), { handleSignals: true }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
