import Joi from 'joi';
import { ValidationError } from './errors';

// Common validation patterns
const patterns = {
  username: /^[a-zA-Z0-9_.@+-]{3,150}$/,
};

// Common validation messages
const messages = {
  'string.empty': '{{#label}} may not be blank',
  'any.required': '{{#label}} is required',
  'string.min': '{{#label}} must be at least {{#limit}} characters',
  'string.max': '{{#label}} must not exceed {{#limit}} characters',
  'number.base': '{{#label}} must be a number',
  'number.min': '{{#label}} must be at least {{#limit}}',
  'number.max': '{{#label}} must not exceed {{#limit}}',
  'object.base': '{{#label}} must be an object',
  'any.only': '{{#label}} must be one of {{#valids}}',
  'date.base': '{{#label}} must be a valid date',
  'boolean.base': '{{#label}} must be a boolean',
  'string.guid': '{{#label}} must be a valid UUID',
};

// Common validation schemas
const schemas = {
  id: Joi.string().guid({ version: ['uuidv4'] }),
  // Open key/value maps; values are checked by their consumers
  keyValueMap: Joi.object().unknown(true),
  labels: Joi.object().pattern(Joi.string(), Joi.alternatives(Joi.string(), Joi.number(), Joi.boolean())),
  dateTime: Joi.date().iso(),
  /** Query-string boolean accepting true/false/1/0 */
  queryBoolean: Joi.boolean().truthy('1', 'True').falsy('0', 'False'),
};

/**
 * Multi-value query parameter given repeated (`?a=x&a=y`) or comma-separated (`?a=x,y`),
 * converted to an array of allowed values
 */
const csvOf = (allowed: readonly string[]) =>
  Joi.alternatives(Joi.array().items(Joi.string()), Joi.string()).custom((value: string | string[], helpers) => {
    const items = (Array.isArray(value) ? value : [value])
      .flatMap((item) => item.split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0);

    const invalid = items.find((item) => !allowed.includes(item));
    if (invalid !== undefined) {
      return helpers.message({
        custom: `Select a valid choice. ${invalid} is not one of the available choices.`,
      });
    }
    return items;
  });

/**
 * Validate `input` against `schema`, returning the converted value or throwing a ValidationError
 * listing every failing field.
 */
const parseInput = <T>(schema: Joi.ObjectSchema<T>, input: unknown): T => {
  const result = schema.validate(input ?? {}, {
    abortEarly: false,
    stripUnknown: true,
    messages,
    errors: { wrap: { label: false } },
  });

  if (result.error || result.value === undefined) {
    throw new ValidationError(
      (result.error?.details ?? []).map((detail) => ({
        field: detail.path.join('.'),
        message: detail.message,
      }))
    );
  }

  return result.value;
};

export { Joi, patterns, messages, schemas, csvOf, parseInput };
