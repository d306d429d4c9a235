import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NotFoundError, ValidationError } from '../base/ServiceError';
import { createClock, createTestServices, type TestServices } from '../../test-utils/services';
import type { Note } from '../../shared/types';

vi.mock('../../utils/logger', async () => (await import('../../test-utils/mocks/logger')).mockLoggerModule);

describe('ReminderService', () => {
  let clock: ReturnType<typeof createClock>;
  let services: TestServices;
  let groceries: Note;

  beforeEach(async () => {
    clock = createClock('2023-12-31T20:00:00.000Z');
    services = await createTestServices({ now: clock.now });
    groceries = await services.note.create('Groceries', 'Milk', ['home']);
  });

  describe('schedule', () => {
    it('should convert local wall-clock time to UTC', async () => {
      const reminder = await services.reminder.schedule(groceries.id, '2024-01-01T09:00', 'America/New_York');

      expect(reminder).toEqual({
        noteId: groceries.id,
        dueAt: '2024-01-01T14:00:00.000Z',
        localTime: '2024-01-01T09:00',
        timezone: 'America/New_York',
        acknowledgedAt: null,
        createdAt: '2023-12-31T20:00:00.000Z',
      });
    });

    it('should apply daylight saving time for the date given', async () => {
      const reminder = await services.reminder.schedule(groceries.id, '2024-07-01 09:00', 'America/New_York');

      expect(reminder.dueAt).toBe('2024-07-01T13:00:00.000Z');
      expect(reminder.localTime).toBe('2024-07-01T09:00');
    });

    it('should replace an earlier reminder on the same note', async () => {
      await services.reminder.schedule(groceries.id, '2024-01-01T09:00', 'UTC');
      await services.reminder.schedule(groceries.id, '2024-01-02T09:00', 'UTC');

      expect(services.reminder.get(groceries.id)?.dueAt).toBe('2024-01-02T09:00:00.000Z');
    });

    it('should reject unknown notes, timezones and malformed times', async () => {
      await expect(services.reminder.schedule('missing', '2024-01-01T09:00', 'UTC')).rejects.toThrow(NotFoundError);
      await expect(services.reminder.schedule(groceries.id, '2024-01-01T09:00', 'Mars/Olympus')).rejects.toThrow(ValidationError);
      await expect(services.reminder.schedule(groceries.id, 'tomorrow 9am', 'UTC')).rejects.toThrow(ValidationError);
      await expect(services.reminder.schedule(groceries.id, '2024-02-30T09:00', 'UTC')).rejects.toThrow(ValidationError);
    });
  });

  describe('dueNow', () => {
    beforeEach(async () => {
      await services.reminder.schedule(groceries.id, '2024-01-01T09:00', 'America/New_York');
    });

    it('should not fire before the due time', () => {
      expect(services.reminder.dueNow(new Date('2024-01-01T13:59:59.999Z'))).toEqual([]);
    });

    it('should fire at the due time with the note title', () => {
      const due = services.reminder.dueNow(new Date('2024-01-01T14:00:00.000Z'));

      expect(due).toHaveLength(1);
      expect(due[0]).toMatchObject({ noteId: groceries.id, title: 'Groceries', dueAt: '2024-01-01T14:00:00.000Z' });
    });

    it('should stop firing once acknowledged', async () => {
      clock.set('2024-01-01T15:00:00.000Z');
      await services.reminder.acknowledge(groceries.id);

      expect(services.reminder.dueNow()).toEqual([]);
      expect(services.reminder.get(groceries.id)?.acknowledgedAt).toBe('2024-01-01T15:00:00.000Z');
    });

    it('should drop the reminder when its note is deleted', async () => {
      await services.note.delete(groceries.id);

      expect(services.reminder.dueNow(new Date('2024-01-02T00:00:00.000Z'))).toEqual([]);
    });
  });

  it('should list upcoming reminders soonest first', async () => {
    const call = await services.note.create('Call Sam', '');
    await services.reminder.schedule(groceries.id, '2024-01-03T09:00', 'UTC');
    await services.reminder.schedule(call.id, '2024-01-02T09:00', 'UTC');

    expect(services.reminder.upcoming().map(r => r.title)).toEqual(['Call Sam', 'Groceries']);
  });

  it('should report acknowledge and clear on notes without a reminder', async () => {
    await expect(services.reminder.acknowledge(groceries.id)).rejects.toThrow(NotFoundError);
    await expect(services.reminder.clear(groceries.id)).rejects.toThrow(NotFoundError);
  });

  it('should clear a reminder', async () => {
    await services.reminder.schedule(groceries.id, '2024-01-01T09:00', 'UTC');
    await services.reminder.clear(groceries.id);

    expect(services.reminder.get(groceries.id)).toBeNull();
  });
});
