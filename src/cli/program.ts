/**
 * Command-line program definition
 */

import { Command } from 'commander';
import { initLogger } from '../utils/logger.js';
import { createClientFactory, type GlobalOptions } from './common.js';
import { createConsoleReporter, type Reporter } from './reporter.js';
import { registerAppendCommand } from './commands/append.js';
import { registerExportCommand } from './commands/export.js';
import { registerUploadCommand } from './commands/upload.js';
import { registerUploadS3Command } from './commands/upload-s3.js';

export function createProgram(reporter: Reporter = createConsoleReporter()): Command {
  const program = new Command();

  program
    .name('gigasheet')
    .description('Upload, append, export and share Gigasheet sheets')
    .option('--api-key <key>', 'API key to use; defaults to $GIGASHEET_API_KEY')
    .option('--debug', 'log every API request', false)
    .hook('preAction', () => {
      initLogger(program.opts<GlobalOptions>().debug);
    });

  const getClient = createClientFactory(program);

  registerUploadCommand(program, getClient, reporter);
  registerAppendCommand(program, getClient, reporter);
  registerExportCommand(program, getClient, reporter);
  registerUploadS3Command(program, getClient, reporter);

  return program;
}
