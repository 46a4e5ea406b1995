import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { BoundProperty } from '../environment/binder';
import { canonicalName } from '../environment/relaxed-names';
import { BindingIssue, DataSourceBindingError } from '../datasource.errors';

/**
 * Numbers, or numeric strings that are not blank
 */
function integer(schema: z.ZodNumber) {
  return z
    .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
    .pipe(schema.int());
}

const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

/**
 * TLS options bound from `ssl.*`, handed to pg as its `ssl` object
 */
const tlsOptionsSchema = z
  .object({
    rejectUnauthorized: flag,
    ca: z.string(),
    cert: z.string(),
    key: z.string(),
    servername: z.string(),
  })
  .partial();

type TlsOptionName = keyof z.infer<typeof tlsOptionsSchema>;

function isTlsOptionName(name: string): name is TlsOptionName {
  return name in tlsOptionsSchema.shape;
}

const TLS_OPTIONS_BY_CANONICAL_NAME = new Map<string, TlsOptionName>(
  Object.keys(tlsOptionsSchema.shape)
    .filter(isTlsOptionName)
    .map((name): [string, TlsOptionName] => [canonicalName(name), name]),
);

/**
 * Pool settings bindable from configuration
 */
export const poolSettingsSchema = z.object({
  /**
   * Full connection URL, also bound from `url`
   */
  connectionString: z.coerce.string(),
  host: z.coerce.string(),
  port: integer(z.number().min(1).max(65535)),
  /**
   * Also bound from `username`
   */
  user: z.coerce.string(),
  password: z.coerce.string(),
  database: z.coerce.string(),
  /**
   * Reported to the server; defaults to the data source name
   */
  applicationName: z.coerce.string(),
  ssl: z.union([flag, tlsOptionsSchema]),

  /**
   * Maximum number of clients in the pool
   */
  max: integer(z.number().positive()),

  /**
   * Minimum number of idle clients kept when evicting
   */
  min: integer(z.number().nonnegative()),

  /**
   * Time an idle client may sit before it is closed
   */
  idleTimeoutMillis: integer(z.number().nonnegative()),

  /**
   * Time to wait for a new connection before failing
   */
  connectionTimeoutMillis: integer(z.number().nonnegative()),

  /**
   * Number of uses after which a client is replaced
   */
  maxUses: integer(z.number().positive()),
  maxLifetimeSeconds: integer(z.number().nonnegative()),
  statementTimeout: integer(z.number().nonnegative()),
  queryTimeout: integer(z.number().nonnegative()),
  idleInTransactionSessionTimeout: integer(z.number().nonnegative()),
  allowExitOnIdle: flag,
  keepAlive: flag,
  keepAliveInitialDelayMillis: integer(z.number().nonnegative()),
});

export type PoolSettings = z.infer<typeof poolSettingsSchema>;
export type PoolSettingName = keyof PoolSettings;

const partialSettingsSchema = poolSettingsSchema.partial();

function isPoolSettingName(name: string): name is PoolSettingName {
  return name in poolSettingsSchema.shape;
}

const SETTING_ALIASES = new Map<string, PoolSettingName>([
  ['url', 'connectionString'],
  ['username', 'user'],
]);

const SETTINGS_BY_CANONICAL_NAME = new Map<string, PoolSettingName>(
  Object.keys(poolSettingsSchema.shape)
    .filter(isPoolSettingName)
    .map((name): [string, PoolSettingName] => [canonicalName(name), name]),
);

function resolveSettingName(name: string): PoolSettingName | undefined {
  return SETTING_ALIASES.get(name) ?? SETTINGS_BY_CANONICAL_NAME.get(name);
}

export interface BindSettingsOptions {
  /**
   * Skip nested properties other than `ssl.*` without warning
   */
  skipNested?: boolean;
}

const logger = new Logger('PoolSettingsBinder');

function warnUnknown(target: string, property: BoundProperty): void {
  logger.warn(
    `Ignoring unknown property '${property.key}' for data source '${target}'`,
  );
}

/**
 * Convert bound configuration properties into pool settings.
 * Throws DataSourceBindingError when a value cannot be converted.
 */
export function bindPoolSettings(
  target: string,
  properties: BoundProperty[],
  options: BindSettingsOptions = {},
): Partial<PoolSettings> {
  const input: Record<string, unknown> = {};
  const keys = new Map<string, string>();
  let tlsOptions: Record<string, unknown> | undefined;

  for (const property of properties) {
    if (property.value === null || property.value === undefined) {
      continue;
    }

    const [head, ...rest] = property.name.split('.');
    if (rest.length > 0) {
      if (rest.length === 1 && resolveSettingName(head) === 'ssl') {
        // a scalar `ssl` from a higher-precedence source wins
        if ('ssl' in input && tlsOptions === undefined) {
          continue;
        }
        const optionName = TLS_OPTIONS_BY_CANONICAL_NAME.get(rest[0]);
        if (!optionName) {
          warnUnknown(target, property);
          continue;
        }
        if (tlsOptions === undefined) {
          tlsOptions = {};
          input.ssl = tlsOptions;
          keys.set('ssl', property.key);
        }
        if (!(optionName in tlsOptions)) {
          tlsOptions[optionName] = property.value;
          keys.set(`ssl.${optionName}`, property.key);
        }
        continue;
      }
      if (!options.skipNested) {
        warnUnknown(target, property);
      }
      continue;
    }

    const settingName = resolveSettingName(property.name);
    if (!settingName) {
      warnUnknown(target, property);
      continue;
    }
    if (settingName in input) {
      continue;
    }

    input[settingName] = property.value;
    keys.set(settingName, property.key);
  }

  const result = partialSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues: BindingIssue[] = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      const field = String(issue.path[0] ?? '');
      return {
        key: keys.get(path) ?? keys.get(field) ?? path,
        message: issue.message,
      };
    });
    throw new DataSourceBindingError(target, issues);
  }

  return result.data;
}
