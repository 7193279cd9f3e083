#!/usr/bin/env node
// CLI entry point for xzopt

import { runCli } from './cli/index.js';

process.exitCode = runCli(process.argv.slice(1));
