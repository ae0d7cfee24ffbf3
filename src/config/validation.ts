import * as Joi from 'joi';

const BOOLEAN_LIKE = ['1', 'true', 'yes', 'y', 'on', '0', 'false', 'no', 'n', 'off'];

const envSchema = Joi.object({
  NODE_ENV: Joi.string().valid('development', 'test', 'production').default('development'),
  BTWATCH_CONFIG: Joi.string().min(1).optional(),
  LOG_LEVEL: Joi.string()
    .valid('fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent')
    .optional(),
  SCANNER_ENABLED: Joi.string()
    .lowercase()
    .valid(...BOOLEAN_LIKE)
    .optional(),
  SCAN_ADAPTER: Joi.string().valid('bluetoothctl', 'simulated').optional(),
  BLUETOOTHCTL_PATH: Joi.string().min(1).optional(),
  CORS_ORIGINS: Joi.string().optional(),
  APP_VERSION: Joi.string().optional()
});

export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const { value, error } = envSchema.validate(config, {
    abortEarly: false,
    allowUnknown: true
  });

  if (error) {
    const details = error.details.map((detail) => `- ${detail.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${details}`);
  }

  return value;
}
