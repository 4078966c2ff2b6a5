/**
 * Runtime JSON Schema for `config.toml`, validated with ajv.
 *
 * Kept as a plain object (not a TypeScript type) so it can be fed
 * directly to `ajv.compile(CONFIG_JSON_SCHEMA)`. Every section and key is
 * optional; defaults are applied after validation.
 */

const nonEmptyString = { type: 'string', minLength: 1 };

export const CONFIG_JSON_SCHEMA = {
  $id: 'https://webui-launch.local/schemas/config.json',
  type: 'object' as const,
  additionalProperties: false,
  properties: {
    container: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: nonEmptyString,
        image: nonEmptyString,
        ports: nonEmptyString,
        data_dir: nonEmptyString,
      },
    },
    ollama: {
      type: 'object',
      additionalProperties: false,
      properties: {
        url: nonEmptyString,
      },
    },
    readiness: {
      type: 'object',
      additionalProperties: false,
      properties: {
        timeout_seconds: { type: 'number', exclusiveMinimum: 0 },
        poll_interval_seconds: { type: 'number', exclusiveMinimum: 0 },
        signature: { type: 'string' },
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
      },
    },
  },
};
