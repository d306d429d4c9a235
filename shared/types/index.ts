// Central export point for all types

export * from './notes.types';
export * from './reminder.types';
export * from './sync.types';
export * from './export.types';
