import Joi from 'joi';
import type { ConfigValidationResult, NetworkSettings } from './types';

// Joi schema for user-defined resource tags (EC2 tag limits).
// Keys that fail the key schema are reported as not allowed.
export const tagsSchema = Joi.object()
  .pattern(
    Joi.string()
      .min(1)
      .max(128)
      .pattern(/^aws:/i, { invert: true }),
    Joi.string()
      .allow('')
      .max(256)
      .messages({
        'string.max': 'Tag values must be no more than 256 characters long',
        'string.base': 'Tag values must be strings'
      })
  );

// Joi schema for AWSSettings
const awsSettingsSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d+$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
    })
});

// Joi schema for ProvisioningSettings
const provisioningSettingsSchema = Joi.object({
  wait_timeout_seconds: Joi.number()
    .integer()
    .min(16)
    .max(3600)
    .default(300)
    .messages({
      'number.min': 'Wait timeout must be at least 16 seconds (the VPC waiter polls every 15 seconds)',
      'number.max': 'Wait timeout must be no more than 3600 seconds (1 hour)'
    }),
  enforce_subnet_containment: Joi.boolean()
    .default(true)
    .messages({
      'boolean.base': 'Enforce subnet containment must be a boolean value'
    }),
  tags: tagsSchema.default({})
});

const networkSettingsSchema = Joi.object<NetworkSettings>({
  aws: awsSettingsSchema.default(),
  provisioning: provisioningSettingsSchema.default()
}).unknown(false);

/**
 * Validates a settings object against the schema
 * @param settings - The parsed settings file content
 */
export function validateSettings(settings: unknown): ConfigValidationResult {
  const { error } = networkSettingsSchema.validate(settings ?? {}, {
    abortEarly: false
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates settings and fills in defaults
 * @throws Error if validation fails
 */
export function validateAndNormalizeSettings(settings: unknown): NetworkSettings {
  const result = networkSettingsSchema.validate(settings ?? {}, {
    abortEarly: false
  });

  if (result.error) {
    const errors = result.error.details.map(detail => detail.message);
    throw new Error(`Settings validation failed:\n${errors.join('\n')}`);
  }

  return result.value;
}
