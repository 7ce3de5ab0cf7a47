#!/usr/bin/env node

/**
 * @shellkit/cli
 * Entry point for the `shellkit` binary.
 */

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
