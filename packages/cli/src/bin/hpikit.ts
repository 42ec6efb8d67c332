#!/usr/bin/env node
/**
 * bin/hpikit.ts: entry point for the `hpikit` command.
 */

import { createProgram } from '../commands/index.js';

await createProgram().parseAsync(process.argv);
