import { logger } from '../../utils/logger';
import { CommandRegistry } from '../CommandRegistry';
import { registerNoteCommands } from '../commands/noteCommands';
import { registerReminderCommands } from '../commands/reminderCommands';
import { registerExportCommand } from '../commands/exportCommand';
import { registerSyncCommands } from '../commands/syncCommands';
import { registerConfigCommand } from '../commands/configCommand';

export const GLOBAL_USAGE = 'notetaker [--encrypt] [--sync] [--timezone <IANA>] [--verbose] <command> [args]';

/**
 * Help text listing every registered command.
 */
export function formatHelp(registry: CommandRegistry): string[] {
  const commands = registry.list();
  const width = Math.max(...commands.map(command => command.name.length));
  return [
    `Usage: ${GLOBAL_USAGE}`,
    '',
    'Global options (saved to the config file):',
    '  --encrypt            encrypt notes at rest (asks for a passphrase)',
    '  --sync               sync with Dropbox after every change',
    '  --timezone <IANA>    timezone for reminders and displayed times',
    '  --verbose            debug logging on stderr',
    '',
    'Commands:',
    ...commands.map(command => `  ${command.name.padEnd(width)}  ${command.summary}`),
    `  ${'help'.padEnd(width)}  Show this help`,
    '',
    'Run a command with --help for its arguments.',
  ];
}

export function registerAllCommands(): CommandRegistry {
  const registry = new CommandRegistry();

  registerNoteCommands(registry);
  registerReminderCommands(registry);
  registerExportCommand(registry);
  registerSyncCommands(registry);
  registerConfigCommand(registry);

  logger.debug(`[Commands] Registered ${registry.list().length} commands`);
  return registry;
}
