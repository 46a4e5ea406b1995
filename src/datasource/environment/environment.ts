import { existsSync, readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { canonicalPath } from './relaxed-names';

export const DEFAULT_CONFIG_FILE = 'config/application.yaml';

/**
 * A named, flat map of dotted keys to values
 */
export interface PropertySource {
  name: string;
  properties: ReadonlyMap<string, unknown>;
}

export interface EnvironmentOptions {
  /**
   * Inline properties, highest precedence. Nested objects or dotted keys.
   */
  properties?: Record<string, unknown>;

  /**
   * Environment variables, defaults to `process.env`
   */
  env?: NodeJS.ProcessEnv;

  /**
   * YAML configuration file. When omitted, `config/application.yaml` is read
   * if it exists.
   */
  configFile?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten nested objects into dotted keys.
 * Empty objects and null leaves are kept as `null` so declared-but-empty
 * entries stay visible.
 */
export function flattenProperties(
  value: unknown,
  path = '',
  into: Map<string, unknown> = new Map(),
): Map<string, unknown> {
  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0 && path) {
      into.set(path, null);
    }
    for (const [key, child] of entries) {
      flattenProperties(child, path ? `${path}.${key}` : key, into);
    }
  } else if (path) {
    into.set(path, value ?? null);
  }
  return into;
}

/**
 * Map an environment variable name onto a dotted key
 * DATABASE_POOL_DATA__SOURCES_ORDERS__DB_MAX -> database.pool.data-sources.orders-db.max
 */
export function envVariableToKey(name: string): string {
  return name.toLowerCase().split('__').map((part) => part.replace(/_/g, '.')).join('-');
}

/**
 * Resolve `${VAR}` and `${VAR:default}` placeholders against the environment.
 * Unknown variables without a default keep the original placeholder.
 */
export function resolvePlaceholders(
  content: string,
  env: NodeJS.ProcessEnv,
): string {
  return content.replace(
    /\$\{([^}:]+)(?::([^}]*))?\}/g,
    (match: string, name: string, fallback: string | undefined) => {
      const value = env[name];
      if (value !== undefined) {
        return value;
      }
      return fallback ?? match;
    },
  );
}

function resolveValues(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return resolvePlaceholders(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => resolveValues(item, env));
  }
  if (isPlainObject(value)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      resolved[key] = resolveValues(child, env);
    }
    return resolved;
  }
  return value;
}

function envSource(env: NodeJS.ProcessEnv): PropertySource {
  const properties = new Map<string, unknown>();
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) {
      properties.set(envVariableToKey(name), value);
    }
  }
  return { name: 'environment', properties };
}

function fileSource(file: string, env: NodeJS.ProcessEnv): PropertySource {
  const content: unknown = parseYaml(readFileSync(file, 'utf8'));
  return {
    name: `file [${file}]`,
    properties: flattenProperties(resolveValues(content, env)),
  };
}

/**
 * Ordered property sources, highest precedence first
 */
export class Environment {
  constructor(private readonly sources: PropertySource[]) {}

  /**
   * Build an environment from inline properties, environment variables and
   * an optional YAML file
   */
  static load(options: EnvironmentOptions = {}): Environment {
    const env = options.env ?? process.env;
    const sources: PropertySource[] = [];

    if (options.properties) {
      sources.push({
        name: 'inline',
        properties: flattenProperties(options.properties),
      });
    }

    sources.push(envSource(env));

    if (options.configFile !== undefined) {
      const file = isAbsolute(options.configFile)
        ? options.configFile
        : resolve(process.cwd(), options.configFile);
      if (!existsSync(file)) {
        throw new Error(`Configuration file not found: ${file}`);
      }
      sources.push(fileSource(file, env));
    } else {
      const file = resolve(process.cwd(), DEFAULT_CONFIG_FILE);
      if (existsSync(file)) {
        sources.push(fileSource(file, env));
      }
    }

    return new Environment(sources);
  }

  /**
   * Environment backed by inline properties only
   */
  static of(properties: Record<string, unknown>): Environment {
    return new Environment([
      { name: 'inline', properties: flattenProperties(properties) },
    ]);
  }

  getPropertySources(): readonly PropertySource[] {
    return this.sources;
  }

  /**
   * Look up a single key with relaxed matching
   */
  getProperty(key: string): unknown {
    const wanted = canonicalPath(key).join('.');
    for (const source of this.sources) {
      for (const [candidate, value] of source.properties) {
        if (canonicalPath(candidate).join('.') === wanted) {
          return value;
        }
      }
    }
    return undefined;
  }
}
