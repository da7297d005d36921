#!/usr/bin/env node
import { program } from 'commander';
import { registerMainCommand } from './cli/commands';
import { registerInitCommand } from './cli/init-command';

// Set up Commander program
program
  .name('mdchunk')
  .description('Split a markdown document into size-bounded text chunks')
  .version('1.0.0');

// Register commands
registerInitCommand(program);
registerMainCommand(program);

// Parse command line arguments
program.parse();
