import { VERSION } from '@docsift/core';
import { Command } from 'commander';

import { analyzeCommand } from './commands/analyze.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { parseNonNegativeInt, parsePositiveInt } from './utils.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('docsift')
    .description('Analyze .txt, .docx and .xlsx documents with Gemini')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('analyze', { isDefault: true })
    .description('Extract a document, analyze it and save the report')
    .argument('[file]', 'Document to analyze (asked for when omitted)')
    .option('--max-chars <n>', 'Characters of document text to send', parsePositiveInt)
    .option('--max-attempts <n>', 'Remote calls before giving up on rate limits', parsePositiveInt)
    .option('--backoff <seconds>', 'Backoff base in seconds (wait = base x (attempt + 1))', parseNonNegativeInt)
    .option('--model <name>', 'Gemini model name')
    .option('--output-dir <dir>', 'Directory for the report file')
    .option('--no-save', 'Do not write a report file')
    .option('--json', 'Print the result as JSON instead of text')
    .action(analyzeCommand);

  program
    .command('init')
    .description('Write a default .docsift.yml in the current directory')
    .option('--force', 'Overwrite an existing .docsift.yml')
    .action(initCommand);

  program
    .command('doctor')
    .description('Check configuration, API key and format libraries')
    .action(doctorCommand);

  return program;
}
