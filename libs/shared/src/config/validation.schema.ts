import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Server
  PORT: Joi.number().port().default(8000),
  HOST: Joi.string().default('127.0.0.1'),

  // Storage
  STATE_DIR: Joi.string().optional().default('./state'),

  // Polls
  POLLS_LATEST_LIMIT: Joi.number().integer().min(1).max(100).default(5).messages({
    'number.min': 'POLLS_LATEST_LIMIT must be at least 1',
    'number.max': 'POLLS_LATEST_LIMIT must be at most 100',
  }),

  // Admin API. Empty disables it.
  ADMIN_TOKEN: Joi.string().allow('').optional().default('').min(8).messages({
    'string.min': 'ADMIN_TOKEN must be at least 8 characters when set',
  }),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
}).options({ allowUnknown: true });
