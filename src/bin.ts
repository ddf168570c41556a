#!/usr/bin/env node
// CHANGE: Executable entry for the `scan-coverage` bin.
// WHY: npm links bins through symlinks, so this module runs the CLI unconditionally.

import { runCli } from "./cli.js";

void runCli(process.argv);
