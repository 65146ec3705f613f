#!/usr/bin/env node

/**
 * recipefind CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv.slice(2));
