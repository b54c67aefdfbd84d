#!/usr/bin/env node
/**
 * luna-oled executable
 *
 * Usage: luna-oled [--preview] [--debug]
 */

import { createSubsystemLogger, describeError } from './logging/subsystem.js';
import { installSignalHandlers, startLunaDisplay } from './oled/index.js';

const log = createSubsystemLogger('oled/main');
const args = process.argv.slice(2);

try {
  const runtime = await startLunaDisplay({
    sink: args.includes('--preview') ? 'preview' : 'ssd1306',
    logging: args.includes('--debug') ? { level: 'debug' } : {},
  });
  installSignalHandlers();
  await runtime.done;
} catch (error) {
  log.fatal('LUNA display failed to start', { error: describeError(error) });
  process.exitCode = 1;
}
