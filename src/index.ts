#!/usr/bin/env node

import { startServer } from './server.js';
import { runCli, USAGE } from './cli.js';

const argv = process.argv.slice(2);
const command = argv[0] && !argv[0].startsWith('-') ? argv[0] : 'scrub';
const args = command === argv[0] ? argv.slice(1) : argv;

if (args.includes('--help') || args.includes('-h')) {
  console.log(USAGE);
} else if (command === 'serve') {
  startServer().catch((error) => {
    console.error('[clip-scrub] Fatal error:', error);
    process.exit(1);
  });
} else if (command === 'scrub' || command === 'check' || command === 'stats') {
  runCli(command, args).then((code) => {
    process.exitCode = code;
  }).catch((error) => {
    console.error('[clip-scrub] Fatal error:', error);
    process.exit(1);
  });
} else {
  console.error(`Unknown command: ${command}\n\n${USAGE}`);
  process.exitCode = 1;
}
