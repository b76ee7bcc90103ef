/**
 * Child process entry for the code unit runner. Always runs `main`: the
 * launcher starts this file directly, whatever path it is reached through.
 */

import { main, reportFatal } from './run-code-unit.js';

main(process.argv.slice(2)).catch(reportFatal);
