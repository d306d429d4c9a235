import { parseArgs, type ParseArgsConfig } from 'util';
import { ValidationError, type ExitCode } from '../services/base/ServiceError';
import type { AppConfig } from '../shared/schemas/configSchemas';
import type { RuntimeSettings } from '../utils/config';
import type { ServiceRegistry } from './bootstrap/serviceBootstrap';

export type CommandOptions = NonNullable<ParseArgsConfig['options']>;

export type OptionValue = string | boolean | Array<string | boolean> | undefined;

export interface ParsedCommandArgs {
  positionals: string[];
  values: Record<string, OptionValue>;
}

/** Where command output goes. Results on `out`, notices on `err`. */
export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
  readStdin: () => Promise<string>;
}

export interface CommandContext {
  io: CommandIO;
  settings: RuntimeSettings;
  now: () => Date;
  /** Opens the note store on first use (may prompt for the passphrase). */
  services: () => Promise<ServiceRegistry>;
  saveConfig: (config: AppConfig) => Promise<void>;
  keyFileExists: () => Promise<boolean>;
}

export interface CommandDefinition {
  name: string;
  usage: string;
  summary: string;
  options?: CommandOptions;
  /** Changes notes; triggers an automatic sync when cloud sync is on. */
  mutates?: boolean;
  run: (args: ParsedCommandArgs, context: CommandContext) => Promise<ExitCode | void>;
}

/** Options every command accepts after its name. */
const COMMON_OPTIONS: CommandOptions = {
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
};

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDefinition>();

  register(definition: CommandDefinition): void {
    if (this.commands.has(definition.name)) {
      throw new Error(`Command '${definition.name}' registered twice`);
    }
    this.commands.set(definition.name, definition);
  }

  get(name: string): CommandDefinition {
    const command = this.commands.get(name);
    if (!command) {
      throw new ValidationError(`Unknown command '${name}'. Run 'notetaker help' for the list of commands.`);
    }
    return command;
  }

  list(): CommandDefinition[] {
    return Array.from(this.commands.values());
  }

  /**
   * Parses the arguments that follow the command name.
   * @throws ValidationError for unknown options or missing option values
   */
  parse(command: CommandDefinition, args: string[]): ParsedCommandArgs {
    try {
      const { values, positionals } = parseArgs({
        args,
        options: { ...COMMON_OPTIONS, ...command.options },
        allowPositionals: true,
        strict: true,
      });
      return { values, positionals };
    } catch (error) {
      if (error instanceof TypeError) {
        throw new ValidationError(`${error.message}\nUsage: ${command.usage}`);
      }
      throw error;
    }
  }
}

export function stringOption(args: ParsedCommandArgs, name: string): string | undefined {
  const value = args.values[name];
  return typeof value === 'string' ? value : undefined;
}

export function booleanOption(args: ParsedCommandArgs, name: string): boolean {
  return args.values[name] === true;
}

/**
 * The positional at `index`, or a ValidationError quoting the usage line.
 */
export function requirePositional(args: ParsedCommandArgs, index: number, label: string, usage: string): string {
  const value = args.positionals[index];
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(`Missing ${label}\nUsage: ${usage}`);
  }
  return value;
}
