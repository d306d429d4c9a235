import fs from 'fs-extra';
import { parseArgs } from 'util';
import { EXIT_CODES, ServiceError, SyncUnavailableError, ValidationError, type ExitCode } from '../services/base/ServiceError';
import type { RemoteNoteStore } from '../services/sync/RemoteNoteStore';
import type { AppConfig } from '../shared/schemas/configSchemas';
import {
  getConfigPath,
  loadConfig,
  resolveRuntimeSettings,
  saveConfig,
  type RuntimeSettings,
} from '../utils/config';
import { logger, setLogLevel } from '../utils/logger';
import { assertTimezone } from '../utils/timezone';
import { formatHelp, registerAllCommands } from './bootstrap/registerCommands';
import type { ServiceRegistry } from './bootstrap/serviceBootstrap';
import type { CommandContext, CommandIO } from './CommandRegistry';
import { formatDueBanner } from './output';
import { createDropboxRemote, StoreSession, type PassphrasePrompt } from './session';

export interface CliDependencies {
  io: CommandIO;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  promptPassphrase?: PassphrasePrompt | null;
  createRemote?: (settings: RuntimeSettings) => RemoteNoteStore | null;
  sleep?: (ms: number) => Promise<void>;
  kdfIterations?: number;
}

interface GlobalFlags {
  encrypt: boolean;
  sync: boolean;
  timezone?: string;
  verbose: boolean;
  help: boolean;
}

/** Global options that take a value, so the scan for the command name skips it. */
const VALUE_FLAGS = new Set(['--timezone']);

function parseGlobalFlags(args: string[]): GlobalFlags {
  try {
    const { values } = parseArgs({
      args,
      options: {
        encrypt: { type: 'boolean' },
        sync: { type: 'boolean' },
        timezone: { type: 'string' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
    });
    return {
      encrypt: values.encrypt === true,
      sync: values.sync === true,
      timezone: values.timezone,
      verbose: values.verbose === true,
      help: values.help === true,
    };
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ValidationError(error.message);
    }
    throw error;
  }
}

/**
 * Splits `argv` into global flags (before the command), the command name and
 * the command's own arguments.
 */
export function parseGlobalArgs(argv: string[]): { globals: GlobalFlags; commandName: string | undefined; rest: string[] } {
  let index = 0;
  while (index < argv.length && argv[index].startsWith('-')) {
    index += VALUE_FLAGS.has(argv[index]) ? 2 : 1;
  }

  return {
    globals: parseGlobalFlags(argv.slice(0, index)),
    commandName: argv[index],
    rest: argv.slice(index + 1),
  };
}

/**
 * `--encrypt`, `--sync` and `--timezone` are sticky: they are written to the
 * config file and apply to later runs too.
 */
async function applyGlobalOverrides(config: AppConfig, globals: GlobalFlags, configPath: string): Promise<AppConfig> {
  let updated = config;
  if (globals.encrypt && !config.encrypted) {
    updated = { ...updated, encrypted: true };
  }
  if (globals.sync && !config.cloudSync) {
    updated = { ...updated, cloudSync: true };
  }
  if (globals.timezone !== undefined) {
    const timezone = assertTimezone(globals.timezone);
    if (timezone !== config.timezone) {
      updated = { ...updated, timezone };
    }
  }

  if (updated !== config) {
    await saveConfig(updated, configPath);
    logger.info(`[CLI] Saved updated settings to ${configPath}`);
  }
  return updated;
}

/**
 * Sync after a change when cloud sync is on. Failures do not undo the local
 * change; they only set the exit code.
 */
async function syncAfterChange(services: ServiceRegistry, io: CommandIO): Promise<ExitCode> {
  if (!services.sync) {
    io.err('Cloud sync is on but no Dropbox token is set; skipping sync.');
    return EXIT_CODES.ok;
  }
  try {
    const report = await services.sync.synchronize();
    if (report.conflicts.length > 0) {
      io.err(`${report.conflicts.length} sync conflict(s) need attention: run 'notetaker conflicts'.`);
      return EXIT_CODES.syncConflict;
    }
    return EXIT_CODES.ok;
  } catch (error) {
    if (error instanceof SyncUnavailableError) {
      io.err(`Warning: ${error.message}. The change is saved locally.`);
      return error.exitCode;
    }
    throw error;
  }
}

function reportError(error: unknown, io: CommandIO): ExitCode {
  if (error instanceof ServiceError) {
    io.err(`Error: ${error.message}`);
    return error.exitCode;
  }
  logger.error('[CLI] Unexpected error:', error);
  io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return EXIT_CODES.fatal;
}

/**
 * Runs one CLI invocation and resolves to its exit code. Never throws.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<ExitCode> {
  const { io } = deps;
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  const registry = registerAllCommands();
  let session: StoreSession | null = null;

  try {
    const { globals, commandName, rest } = parseGlobalArgs(argv);
    if (globals.verbose) {
      setLogLevel('debug');
    }

    if (commandName === undefined || commandName === 'help') {
      formatHelp(registry).forEach(line => io.out(line));
      return commandName === undefined && !globals.help ? EXIT_CODES.usage : EXIT_CODES.ok;
    }

    const command = registry.get(commandName);
    const args = registry.parse(command, rest);
    if (args.values.verbose === true) {
      setLogLevel('debug');
    }
    if (args.values.help === true || globals.help) {
      io.out(`Usage: ${command.usage}`);
      io.out(command.summary);
      return EXIT_CODES.ok;
    }

    const configPath = getConfigPath(env);
    const config = await applyGlobalOverrides(await loadConfig(configPath), globals, configPath);
    const settings = resolveRuntimeSettings(config, configPath, env);

    const activeSession = new StoreSession(settings, {
      io,
      now,
      promptPassphrase: deps.promptPassphrase ?? null,
      createRemote: deps.createRemote ?? createDropboxRemote,
      sleep: deps.sleep,
      kdfIterations: deps.kdfIterations,
    });
    session = activeSession;

    const context: CommandContext = {
      io,
      settings,
      now,
      services: () => activeSession.open(),
      saveConfig: updated => saveConfig(updated, configPath),
      keyFileExists: () => fs.pathExists(settings.keyFilePath),
    };

    const result = await command.run(args, context);
    let exitCode: ExitCode = typeof result === 'number' ? result : EXIT_CODES.ok;

    if (activeSession.isOpen) {
      const services = await activeSession.open();
      if (command.mutates && config.cloudSync) {
        const syncCode = await syncAfterChange(services, io);
        exitCode = exitCode === EXIT_CODES.ok ? syncCode : exitCode;
      }
      formatDueBanner(services.reminder.dueNow(now()), config.timezone).forEach(line => io.err(line));
    }

    return exitCode;
  } catch (error) {
    return reportError(error, io);
  } finally {
    if (session) {
      await session.close();
    }
  }
}
