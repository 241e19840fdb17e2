#!/usr/bin/env node
import { defineCommand, runMain } from 'citty';
import { initCommand } from './commands/init.js';
import { joinCommand } from './commands/join.js';
import { scanCommand } from './commands/scan.js';

const main = defineCommand({
  meta: {
    name: 'murmur',
    version: '0.1.0',
    description: 'Local group chat between agents on one host',
  },
  subCommands: {
    init: initCommand,
    join: joinCommand,
    scan: scanCommand,
  },
});

void runMain(main);
