import { Command } from 'commander';
import {
  setCommand,
  addKeyCommand,
  removeKeyCommand,
  pidFileCommand,
  pidCommand,
  getConfigCommand,
  setConfigCommand,
  statusCommand,
  initCommand,
} from './commands/index.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ftl-utils')
    .description('Edit key=value config files, read the FTL PID and proxy FTL --config')
    .version(VERSION);

  // Values such as `-10` are passed through instead of parsed as options
  program
    .command('set')
    .description('Add or update a key=value line')
    .argument('<file>', 'config file to edit')
    .argument('<key>')
    .argument('<value>')
    .option('-v, --verbose', 'Enable debug logging')
    .allowUnknownOption()
    .action(setCommand);

  program
    .command('add-key')
    .description('Append a bare key line unless it is already present')
    .argument('<file>', 'config file to edit')
    .argument('<key>')
    .option('-v, --verbose', 'Enable debug logging')
    .action(addKeyCommand);

  program
    .command('remove-key')
    .description('Delete every line matching a key')
    .argument('<file>', 'config file to edit')
    .argument('<key>')
    .option('-v, --verbose', 'Enable debug logging')
    .action(removeKeyCommand);

  program
    .command('pid-file')
    .description("Print the path of FTL's PID file")
    .option('-v, --verbose', 'Enable debug logging')
    .action(pidFileCommand);

  program
    .command('pid')
    .description("Print FTL's PID, or -1 if it is unknown")
    .argument('[pidFile]', 'PID file to read (default: resolved like pid-file)')
    .option('-v, --verbose', 'Enable debug logging')
    .action(pidCommand);

  program
    .command('get-config')
    .description('Read a setting through FTL --config')
    .argument('<key>', 'setting name, e.g. dns.piholePTR')
    .option('-v, --verbose', 'Enable debug logging')
    .action(getConfigCommand);

  program
    .command('set-config')
    .description('Write a setting through FTL --config')
    .argument('<key>', 'setting name, e.g. dns.piholePTR')
    .argument('<value>')
    .option('-v, --verbose', 'Enable debug logging')
    .allowUnknownOption()
    .action(setConfigCommand);

  program
    .command('status')
    .description('Show FTL status and configuration')
    .option('-v, --verbose', 'Enable debug logging')
    .action(statusCommand);

  program
    .command('init')
    .description('Create a configuration file')
    .option('-f, --force', 'Overwrite existing config file')
    .option('-l, --local', 'Create config in current directory instead of global location')
    .action(initCommand);

  return program;
}
