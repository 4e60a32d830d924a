#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from './commands/run.js';

const program = new Command()
  .name('cssproof')
  .description('Build-time assertions for stylesheets, reported as CSS')
  .version('0.1.0');

program.addCommand(runCommand);

program.parse();
