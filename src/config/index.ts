import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import type { StoredImageEncoding } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type IngressConfig = {
  connect: string[];
  bind: string[];
  topics: string[];
  pollTimeoutMs: number;
};

export type OutputConfig = {
  imageDir: string;
  logDir: string;
  fileIdKey: string;
  timezone: string;
};

export type PersistenceConfig = {
  enabled: boolean;
  inhibitionSeconds: number;
  logWindowSeconds: number;
  flatten: boolean;
  csvFields: string[];
  imageEncoding: StoredImageEncoding;
  jpegQuality: number;
};

export type StatsConfig = {
  intervalSeconds: number;
};

export type DisplayConfig = {
  enabled: boolean;
  queueCapacity: number;
  refreshIntervalMs: number;
  snapshotDir?: string;
};

export type FramedumpConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  ingress: IngressConfig;
  output: OutputConfig;
  persistence: PersistenceConfig;
  stats: StatsConfig;
  display: DisplayConfig;
  quiet: boolean;
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
};

const stringListSchema: JsonSchema = {
  type: 'array',
  items: { type: 'string', minLength: 1 }
};

const framedumpConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'ingress', 'output', 'persistence', 'stats', 'display'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string', minLength: 1 }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    ingress: {
      type: 'object',
      required: ['connect', 'bind', 'topics', 'pollTimeoutMs'],
      additionalProperties: false,
      properties: {
        connect: stringListSchema,
        bind: stringListSchema,
        topics: { type: 'array', items: { type: 'string' } },
        pollTimeoutMs: { type: 'integer', minimum: 1 }
      }
    },
    output: {
      type: 'object',
      required: ['imageDir', 'logDir', 'fileIdKey', 'timezone'],
      additionalProperties: false,
      properties: {
        imageDir: { type: 'string', minLength: 1 },
        logDir: { type: 'string', minLength: 1 },
        fileIdKey: { type: 'string' },
        timezone: { type: 'string', minLength: 1 }
      }
    },
    persistence: {
      type: 'object',
      required: [
        'enabled',
        'inhibitionSeconds',
        'logWindowSeconds',
        'flatten',
        'csvFields',
        'imageEncoding',
        'jpegQuality'
      ],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        inhibitionSeconds: { type: 'number', minimum: 0 },
        logWindowSeconds: { type: 'number', minimum: 1 },
        flatten: { type: 'boolean' },
        csvFields: stringListSchema,
        imageEncoding: { type: 'string', enum: ['jpeg', 'png'] },
        jpegQuality: { type: 'integer', minimum: 1, maximum: 100 }
      }
    },
    stats: {
      type: 'object',
      required: ['intervalSeconds'],
      additionalProperties: false,
      properties: {
        intervalSeconds: { type: 'number', minimum: 0 }
      }
    },
    display: {
      type: 'object',
      required: ['enabled', 'queueCapacity', 'refreshIntervalMs'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        queueCapacity: { type: 'integer', minimum: 1 },
        refreshIntervalMs: { type: 'number', minimum: 0 },
        snapshotDir: { type: 'string' }
      }
    },
    quiet: { type: 'boolean' }
  }
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateRange(schema: JsonSchema, value: number, pathLabel: string, errors: string[]) {
  if (typeof schema.minimum === 'number' && value < schema.minimum) {
    errors.push(`${pathLabel} must be >= ${schema.minimum}`);
  }
  if (typeof schema.maximum === 'number' && value > schema.maximum) {
    errors.push(`${pathLabel} must be <= ${schema.maximum}`);
  }
  if (schema.enum && !schema.enum.includes(value)) {
    errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
  }
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isPlainObject(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, value[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
      return errors;
    }

    validateRange(schema, value, pathLabel, errors);
    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
      errors.push(`${pathLabel} must not be empty`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function isValidTimezone(timezone: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function validateLogicalConfig(config: FramedumpConfig): string[] {
  const messages: string[] = [];
  const { connect, bind } = config.ingress;

  if (connect.length > 0 && bind.length > 0) {
    messages.push('config.ingress.connect and config.ingress.bind are mutually exclusive');
  }
  if (connect.length === 0 && bind.length === 0) {
    messages.push('config.ingress must define at least one connect or bind endpoint');
  }

  [...connect, ...bind].forEach(endpoint => {
    if (!/^(tcp|ipc|inproc|pgm|epgm|ws|wss):\/\/.+/.test(endpoint)) {
      messages.push(`config.ingress endpoint "${endpoint}" is not a valid transport address`);
    }
  });

  if (!isValidTimezone(config.output.timezone)) {
    messages.push(`config.output.timezone "${config.output.timezone}" is not a known time zone`);
  }

  const keyPath = config.output.fileIdKey;
  if (keyPath.length > 0 && keyPath.split('.').some(segment => segment.length === 0)) {
    messages.push(`config.output.fileIdKey "${keyPath}" contains an empty segment`);
  }

  const seenFields = new Set<string>();
  for (const field of config.persistence.csvFields) {
    if (seenFields.has(field)) {
      messages.push(`config.persistence.csvFields lists "${field}" more than once`);
    }
    seenFields.add(field);
  }

  return messages;
}

export function validateConfig(config: unknown): asserts config is FramedumpConfig {
  const errors = validateAgainstSchema(framedumpConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  const logical = validateLogicalConfig(config as FramedumpConfig);
  if (logical.length > 0) {
    throw new ConfigError(logical);
  }
}

export function parseConfig(contents: string): FramedumpConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Failed to parse configuration: ${message}`]);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): FramedumpConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/** Creates the output directories the enabled features write into and checks they are writable. */
export function ensureOutputDirectories(config: FramedumpConfig): string[] {
  const directories: string[] = [];
  if (config.persistence.enabled) {
    directories.push(config.output.imageDir, config.output.logDir);
  }
  if (config.display.enabled && config.display.snapshotDir) {
    directories.push(config.display.snapshotDir);
  }

  const problems: string[] = [];
  for (const directory of directories) {
    try {
      fs.mkdirSync(directory, { recursive: true });
      fs.accessSync(directory, fs.constants.W_OK);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      problems.push(`${directory} is not writable: ${message}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return directories.map(directory => path.resolve(directory));
}

export { framedumpConfigSchema };
