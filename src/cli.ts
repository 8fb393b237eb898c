#!/usr/bin/env node
/**
 * Intervals CLI
 *
 * Command-line interface for extracting intervals from constraints.
 */

import { runCli } from "./commands";

process.exitCode = runCli(process.argv.slice(2));
