import * as fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import type { HandlerEntry } from './handlers/types.js';

export interface AppConfig {
  delivery: {
    /** Gateway URL template, see DeliveryClient. Empty disables delivery. */
    url: string;
    timeoutMs: number;
  };
  database: {
    path: string;
  };
  handlers: HandlerEntry[];
  logging: LoggingConfig;
}

export interface LoggingConfig {
  level: string;
  format: 'json' | 'simple';
  file?: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  delivery: { url: '', timeoutMs: 10000 },
  database: { path: 'data/textrouter.db' },
  handlers: [],
  logging: { level: 'info', format: 'simple' },
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) throw new Error(`Invalid config: "${key}" must be a mapping`);
  return value;
}

function str(sec: Section, key: string, path: string, fallback: string): string {
  const value = sec[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') throw new Error(`Invalid config: "${path}" must be a string`);
  return value;
}

function num(sec: Section, key: string, path: string, fallback: number): number {
  const value = sec[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid config: "${path}" must be a non-negative number`);
  }
  return value;
}

function parseHandlers(value: unknown): HandlerEntry[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new Error('Invalid config: "handlers" must be a list');

  return value.map((item: unknown, index): HandlerEntry => {
    // a bare string is shorthand for a handler without options
    if (typeof item === 'string') return { name: item };
    if (isSection(item)) {
      const name = item.name;
      if (typeof name === 'string' && name) return { ...item, name };
    }
    throw new Error(`Invalid config: handlers[${index}] needs a name`);
  });
}

/**
 * Normalize a parsed config document over the defaults. `env` overrides:
 * ROUTER_URL replaces delivery.url.
 */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let doc: Section = {};
  if (isSection(raw)) {
    doc = raw;
  } else if (raw !== undefined && raw !== null) {
    throw new Error('Invalid config: top level must be a mapping');
  }

  const delivery = section(doc, 'delivery');
  const database = section(doc, 'database');
  const logging = section(doc, 'logging');

  const format = str(logging, 'format', 'logging.format', DEFAULT_CONFIG.logging.format);
  if (format !== 'json' && format !== 'simple') {
    throw new Error('Invalid config: "logging.format" must be json or simple');
  }
  const file = str(logging, 'file', 'logging.file', '');

  return {
    delivery: {
      url: env.ROUTER_URL ?? str(delivery, 'url', 'delivery.url', DEFAULT_CONFIG.delivery.url),
      timeoutMs: num(delivery, 'timeoutMs', 'delivery.timeoutMs', DEFAULT_CONFIG.delivery.timeoutMs),
    },
    database: {
      path: str(database, 'path', 'database.path', DEFAULT_CONFIG.database.path),
    },
    handlers: parseHandlers(doc.handlers),
    logging: {
      level: str(logging, 'level', 'logging.level', DEFAULT_CONFIG.logging.level),
      format,
      ...(file ? { file } : {}),
    },
  };
}

export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const content = await fs.readFile(configPath, 'utf-8');
  return resolveConfig(parseYaml(content), env);
}
