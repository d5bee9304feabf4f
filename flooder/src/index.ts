#!/usr/bin/env node
import { runFlooder } from "./app.js";
import { parseArguments } from "./cli.js";

const TAG = "Flooder";

const parsed = parseArguments(process.argv.slice(2));

if (parsed.kind === "exit") {
  process.exitCode = parsed.code;
} else {
  runFlooder(parsed.options).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`[${TAG}] crashed:`, err);
      process.exit(1);
    }
  );
}
