#!/usr/bin/env node

/**
 * Flat Pages CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
