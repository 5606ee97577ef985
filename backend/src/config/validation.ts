import * as Joi from 'joi';

export const validationSchema = Joi.object({
  PORT: Joi.number().default(5000),
  APP_NAME: Joi.string(),
  APP_VERSION: Joi.string(),

  AUTH_ENFORCE: Joi.boolean().default(false),
  API_KEY: Joi.string().when('AUTH_ENFORCE', {
    is: true,
    then: Joi.required(),
    otherwise: Joi.allow('', null),
  }),

  FLEET_STALE_THRESHOLD_MS: Joi.number().integer().positive().default(600000),
  FLEET_ACTIVITY_LOG_LIMIT: Joi.number().integer().positive().default(50),
  FLEET_CONTENT_PREVIEW_LENGTH: Joi.number().integer().min(0).default(100),
  FLEET_COMMAND_QUEUE_WARN_DEPTH: Joi.number().integer().positive().default(100),
  FLEET_SWEEP_INTERVAL_MS: Joi.number().integer().min(0).default(0),
});
