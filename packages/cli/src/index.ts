/**
 * @hpikit/cli
 *
 * Command-line front end. The `hpikit` binary lives in bin/hpikit.ts.
 *
 * Usage:
 *   hpikit package [-p <dir>] [--short-name <name>] [--file-extension jpi]
 *   hpikit roles [--json]
 *   hpikit classpath [role] [-p <dir>]
 *   hpikit test-dependencies [--hpl]
 *   hpikit manifest
 */

export { createProgram } from './commands/index.js';
export { ConsoleLogSink } from './output/console-sink.js';
export { runCommand } from './commands/shared.js';
