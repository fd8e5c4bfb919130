#!/usr/bin/env node
/**
 * pbo-tools - CLI entry point
 *
 * Command-line interface for packing and extracting PBO archives.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
