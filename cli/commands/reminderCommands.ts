import { ValidationError } from '../../services/base/ServiceError';
import { booleanOption, requirePositional, stringOption, type CommandRegistry } from '../CommandRegistry';
import { formatReminderLine, shortId } from '../output';
import { formatInZone } from '../../utils/timezone';

export function registerReminderCommands(registry: CommandRegistry): void {
  registry.register({
    name: 'remind',
    usage: 'notetaker remind <id> <YYYY-MM-DDTHH:mm> [--timezone <IANA>]',
    summary: 'Set or replace the reminder of a note (local time in the given zone)',
    options: { timezone: { type: 'string', short: 'z' } },
    async run(args, context) {
      const idOrPrefix = requirePositional(args, 0, 'note id', this.usage);
      // "2024-01-01 09:00" arrives as two positionals when unquoted
      const dueAtLocal = args.positionals.slice(1).join(' ');
      if (!dueAtLocal.trim()) {
        throw new ValidationError(`Missing due time\nUsage: ${this.usage}`);
      }
      const timezone = stringOption(args, 'timezone') ?? context.settings.config.timezone;

      const { note: noteService, reminder: reminderService } = await context.services();
      const reminder = await reminderService.schedule(noteService.resolveId(idOrPrefix), dueAtLocal, timezone);
      context.io.out(
        `Reminder set for ${shortId(reminder.noteId)} at ${reminder.localTime.replace('T', ' ')} ${reminder.timezone} ` +
        `(${formatInZone(reminder.dueAt, context.settings.config.timezone)})`
      );
    },
  });

  registry.register({
    name: 'reminders',
    usage: 'notetaker reminders [--upcoming]',
    summary: 'List due reminders, or future ones with --upcoming',
    options: { upcoming: { type: 'boolean', short: 'u' } },
    async run(args, context) {
      const { reminder: reminderService } = await context.services();
      const upcoming = booleanOption(args, 'upcoming');
      const reminders = upcoming ? reminderService.upcoming(context.now()) : reminderService.dueNow(context.now());
      if (reminders.length === 0) {
        context.io.out(upcoming ? 'No upcoming reminders.' : 'No reminders due.');
        return;
      }
      reminders.forEach(reminder => context.io.out(formatReminderLine(reminder, context.settings.config.timezone)));
    },
  });

  registry.register({
    name: 'ack',
    usage: 'notetaker ack <id>',
    summary: 'Acknowledge a reminder so it stops showing as due',
    async run(args, context) {
      const { note: noteService, reminder: reminderService } = await context.services();
      const id = noteService.resolveId(requirePositional(args, 0, 'note id', this.usage));
      await reminderService.acknowledge(id);
      context.io.out(`Acknowledged reminder for ${shortId(id)}`);
    },
  });

  registry.register({
    name: 'unremind',
    usage: 'notetaker unremind <id>',
    summary: 'Remove the reminder of a note',
    async run(args, context) {
      const { note: noteService, reminder: reminderService } = await context.services();
      const id = noteService.resolveId(requirePositional(args, 0, 'note id', this.usage));
      await reminderService.clear(id);
      context.io.out(`Removed reminder for ${shortId(id)}`);
    },
  });
}
