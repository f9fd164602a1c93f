#!/usr/bin/env -S npx tsx
// bin/procfsm.ts
// procfsm CLI - runs a JSON process term and prints the run report
//
// Run:  npx tsx bin/procfsm.ts [options] <term.json>

import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  parseInjection,
  formatReport,
  reportToJson,
  exitCodeFor,
} from "./procfsm-cli-lib";
import { loadConfig } from "../src/core/config";
import { loggerFor } from "../src/core/logging";
import { parseProcess } from "../src/core/codec";
import { EngineError } from "../src/core/errors";
import { Engine } from "../src/runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): number {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }
  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }
  if (cliArgs.errors.length > 0) {
    for (const e of cliArgs.errors) console.error(`Error: ${e}`);
    return 2;
  }

  const cli = buildConfig(cliArgs);
  if (!cli.file) {
    console.error("Error: No term file specified (see --help)");
    return 2;
  }

  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  // Logs go to stderr so the report can be piped.
  const logger = loggerFor(config.logging, { stderr: true });

  const term = parseProcess(fs.readFileSync(cli.file, "utf8"));
  const engine = new Engine({ config, logger });
  if (cli.trace) {
    engine.observe((event) => console.error(JSON.stringify(event)));
  }

  engine.load(term);
  for (const raw of cli.injections) {
    const m = parseInjection(raw);
    engine.inject(m.channel, m.payload);
  }

  const result = engine.run();
  console.log(cli.json ? JSON.stringify(reportToJson(result), null, 2) : formatReport(result));
  return exitCodeFor(result);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

try {
  process.exitCode = main();
} catch (error) {
  if (error instanceof EngineError) {
    console.error(`Error (${error.code}): ${error.message}`);
  } else {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}
