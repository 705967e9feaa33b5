#!/usr/bin/env node
/**
 * bin/mediagate.ts: Entry point for the `mediagate` CLI command.
 *
 * MEDIAGATE_HOME=/srv/node mediagate validate audio/ogg
 */

const { program } = await import('../commands/index.js')
program.parse()
