#!/usr/bin/env node
/**
 * CLI entry point for claude-sandbox.
 */

import { main } from "./program.js";

process.exitCode = await main(process.argv.slice(2));
