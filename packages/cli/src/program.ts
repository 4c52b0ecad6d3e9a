import { Command } from 'commander';

import { VERSION, listPresets } from '@taskpilot/core';

import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { rulesIngestCommand, rulesTryCommand } from './commands/rules.js';
import { runCommand } from './commands/run.js';
import { sessionsListCommand, sessionsShowCommand } from './commands/sessions.js';
import { parsePositiveInt } from './utils.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('taskpilot')
    .description('Drive a desktop toward a goal: observe, decide, act, verify')
    .version(VERSION);

  program
    .command('init')
    .description('Write .taskpilot.yml and create the data directories')
    .option('--preset <name>', `Start from a preset (${listPresets().join('|')})`)
    .option('--force', 'Overwrite an existing .taskpilot.yml')
    .action(initCommand);

  program
    .command('doctor')
    .description('Preflight diagnostics: config, database, node, capture, executor')
    .action(doctorCommand);

  program
    .command('run')
    .description('Run one session toward a goal')
    .argument('<goal>', 'Goal in natural language')
    .option('--budget <n>', 'Step budget before the first plan revision', parsePositiveInt('Budget'))
    .option('--browser <name>', 'Browser name reported in the environment summary')
    .option('--dry-run', 'Log instructions instead of performing them')
    .option('--preset <name>', `Apply a preset on top of the defaults (${listPresets().join('|')})`)
    .option('--verbose', 'Enable debug logging')
    .action(runCommand);

  const sessions = program
    .command('sessions')
    .description('Inspect recorded sessions');

  sessions
    .command('list')
    .description('List sessions, newest first')
    .option('--status <status>', 'Filter by status (running|success|stuck|lost|error)')
    .option('--limit <n>', 'Max results', parsePositiveInt('Limit'), 20)
    .action(sessionsListCommand);

  sessions
    .command('show')
    .description('Show a session with its step records and post-mortem')
    .argument('<session-id>', 'Session ID')
    .action(sessionsShowCommand);

  const rules = program
    .command('rules')
    .description('Maintain the translation rule file');

  rules
    .command('ingest')
    .description('Propose rules from recorded steps')
    .option('--write', 'Append new rules to the rule file')
    .option('--output <path>', 'Rule file to merge into (default: translator.rulesFile)')
    .option('--verbose', 'Enable debug logging')
    .action(rulesIngestCommand);

  rules
    .command('try')
    .description('Show the instruction a step description translates to')
    .argument('<description>', 'Step description')
    .option('--env <text>', 'Environment summary to translate against')
    .option('--browser <name>', 'Browser name for the environment summary')
    .action(rulesTryCommand);

  return program;
}
