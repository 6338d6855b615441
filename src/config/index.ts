import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DetectionConfig = {
  gridSize: number;
  classCount: number;
  boxesPerCell: number;
  threshold: number;
  iouThreshold: number;
  labels: string[];
  classAware?: boolean;
  maxDetections?: number;
};

export type GridDetectConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  detection: DetectionConfig;
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
  minItems?: number;
};

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const detectionConfigSchema: JsonSchema = {
  type: 'object',
  required: ['gridSize', 'classCount', 'boxesPerCell', 'threshold', 'iouThreshold', 'labels'],
  additionalProperties: false,
  properties: {
    gridSize: { type: 'integer', minimum: 1 },
    classCount: { type: 'integer', minimum: 1 },
    boxesPerCell: { type: 'integer', minimum: 1 },
    threshold: { type: 'number', minimum: 0, maximum: 1 },
    iouThreshold: { type: 'number', minimum: 0, maximum: 1 },
    labels: {
      type: 'array',
      minItems: 1,
      items: { type: 'string' }
    },
    classAware: { type: 'boolean' },
    maxDetections: { type: 'integer', minimum: 1 }
  }
};

const gridDetectConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'detection'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: LOG_LEVELS }
      }
    },
    detection: detectionConfigSchema
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    for (const key of Object.keys(value)) {
      if (definedProperties.has(key)) {
        continue;
      }
      if (additional === false) {
        errors.push(`${pathLabel}.${key} is not allowed`);
      } else if (additional && typeof additional === 'object') {
        errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
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

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push(`${pathLabel} must contain at least ${schema.minItems} item(s)`);
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item: unknown, index) => {
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
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertSchema(config: unknown): asserts config is GridDetectConfig {
  const errors = validateAgainstSchema(gridDetectConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is GridDetectConfig {
  assertSchema(config);
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): GridDetectConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): GridDetectConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: GridDetectConfig) {
  const messages: string[] = [];
  const { detection } = config;

  if (detection.labels.length < detection.classCount) {
    messages.push(
      `config.detection.labels lists ${detection.labels.length} label(s) but classCount is ${detection.classCount}`
    );
  }

  const seen = new Map<string, number>();
  detection.labels.forEach((label, index) => {
    const trimmed = label.trim();
    if (!trimmed) {
      messages.push(`config.detection.labels[${index}] must be a non-empty string`);
      return;
    }
    const existing = seen.get(trimmed);
    if (existing !== undefined) {
      messages.push(
        `config.detection.labels[${index}] duplicates label "${trimmed}" already used by config.detection.labels[${existing}]`
      );
    } else {
      seen.set(trimmed, index);
    }
  });

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: GridDetectConfig;
  next: GridDetectConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: GridDetectConfig;
  private readonly filePath: string;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): GridDetectConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  /** Re-reads the file; on failure the previous configuration stays active. */
  reload(): GridDetectConfig {
    const next = loadConfigFromFile(this.filePath);
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }
}

let defaultManager: ConfigManager | null = null;

export function getDefaultConfigManager(): ConfigManager {
  if (!defaultManager) {
    defaultManager = new ConfigManager();
  }
  return defaultManager;
}
