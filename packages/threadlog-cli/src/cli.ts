#!/usr/bin/env -S npx tsx
/**
 * CLI entry point for threadlog.
 */
process.title = "threadlog";

import { main } from "./main.js";

const exitCode = main(process.argv.slice(2));
process.exit(exitCode);
