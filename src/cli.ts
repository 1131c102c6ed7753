#!/usr/bin/env node
import { runCli } from "./cli_commands.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  },
);
