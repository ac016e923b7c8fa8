// Module
export * from './shared.module';

// Types
export * from './types/poll.types';

// Config
export * from './config/configuration';
export * from './config/validation.schema';

// Storage
export * from './storage/polls.store';

// Utils
export * from './utils/file.utils';
export * from './utils/date.utils';
export * from './utils/html.utils';
