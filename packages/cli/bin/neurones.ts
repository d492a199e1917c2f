#!/usr/bin/env -S node --import tsx

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { registerAskCommand } from "../src/commands/ask.js";
import { registerCompareCommand } from "../src/commands/compare.js";
import { registerConfigCommand } from "../src/commands/config.js";
import { registerRunCommand } from "../src/commands/run.js";
import { registerStatusCommand } from "../src/commands/status.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string" ? pkg.version : "0.0.0";

const program = new Command();

program
  .name("neurones")
  .description("Coordinate command-line AI agents: plan, delegate in parallel, synthesize")
  .version(version);

registerAskCommand(program);
registerRunCommand(program);
registerCompareCommand(program);
registerStatusCommand(program);
registerConfigCommand(program);
await program.parseAsync();
