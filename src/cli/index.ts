#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from './commands/run.js';

const program = new Command()
  .name('cifcheck')
  .description('Declarative test runner for crystallographic commands that produce CIF output')
  .version('0.1.0');

program.addCommand(runCommand);

await program.parseAsync();
