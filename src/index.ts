#!/usr/bin/env node

import { runCli } from "./cli.js";
import { loadLoggerConfig } from "./config.js";
import { PhraseError, errorMessage } from "./utils/errors.js";
import Logger from "./utils/logger.js";

function main(): void {
  // Logs go to stderr unless LOG_FILE is set; stdout only carries passphrases
  Logger.initialize(loadLoggerConfig());

  process.exitCode = runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  });
}

try {
  main();
} catch (error) {
  // A PhraseError here can come from the logger itself, so it bypasses it
  process.stderr.write(`error: ${errorMessage(error)}\n`);
  process.exitCode = 1;
  if (!(error instanceof PhraseError)) {
    const stack = error instanceof Error ? error.stack : undefined;
    Logger.error("Unexpected failure", { error: errorMessage(error), stack });
  }
}
