import { registerAs } from '@nestjs/config';

export const serverConfig = registerAs('server', () => ({
  port: parseInt(process.env.PORT || '8000', 10),
  host: process.env.HOST || '127.0.0.1',
}));

export const pathsConfig = registerAs('paths', () => ({
  stateDir: process.env.STATE_DIR || './state',
}));

export const pollsConfig = registerAs('polls', () => ({
  latestLimit: parseInt(process.env.POLLS_LATEST_LIMIT || '5', 10),
}));

export const adminConfig = registerAs('admin', () => ({
  token: process.env.ADMIN_TOKEN || '',
}));

export const loggingConfig = registerAs('logging', () => ({
  level: process.env.LOG_LEVEL || 'info',
}));
