import { ValidationError } from '../../services/base/ServiceError';
import { describeConfig, setConfigValue } from '../../utils/config';
import type { CommandRegistry } from '../CommandRegistry';

export function registerConfigCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'config',
    usage: 'notetaker config [<key> <value>]',
    summary: 'Show the configuration, or change one setting',
    async run(args, context) {
      const { config, configPath } = context.settings;
      const [key, ...rest] = args.positionals;

      if (key === undefined) {
        context.io.out(`# ${configPath}`);
        describeConfig(config).forEach(line => context.io.out(line));
        return;
      }
      if (rest.length === 0) {
        throw new ValidationError(`Missing value for '${key}'\nUsage: ${this.usage}`);
      }

      const updated = setConfigValue(config, key, rest.join(' '));
      if (config.encrypted && !updated.encrypted && (await context.keyFileExists())) {
        throw new ValidationError('Encryption cannot be turned off once notes are encrypted');
      }

      await context.saveConfig(updated);
      context.io.out(`Set ${key}`);
    },
  });
}
