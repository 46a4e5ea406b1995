import { DataSourceDefinitionError } from '../datasource.errors';
import { Environment } from './environment';
import { canonicalName, canonicalPath } from './relaxed-names';

/**
 * A single leaf property found beneath a prefix
 */
export interface BoundProperty {
  /**
   * Canonical remainder path below the prefix, e.g. `idletimeoutmillis`
   */
  name: string;

  /**
   * Key as written in its property source
   */
  key: string;

  value: unknown;
}

function startsWithPath(segments: string[], prefix: string[]): boolean {
  return prefix.every((segment, index) => segments[index] === segment);
}

/**
 * Reads structured values out of an Environment with relaxed key matching
 */
export class Binder {
  private constructor(private readonly environment: Environment) {}

  static get(environment: Environment): Binder {
    return new Binder(environment);
  }

  /**
   * Bind the children of `prefix` as a map of name to property bag.
   * Names keep the spelling of the highest-precedence source; two spellings
   * of one name inside a single source are rejected.
   */
  bindMap(prefix: string): Map<string, Record<string, unknown>> {
    const prefixPath = canonicalPath(prefix);
    const result = new Map<string, Record<string, unknown>>();
    const seen = new Map<string, string>();

    for (const source of this.environment.getPropertySources()) {
      const spellings = new Map<string, string>();
      for (const [key, value] of source.properties) {
        const original = key.split('.').filter((segment) => segment.length > 0);
        const segments = original.map(canonicalName);
        if (
          segments.length <= prefixPath.length ||
          !startsWithPath(segments, prefixPath)
        ) {
          continue;
        }

        const entryName = original[prefixPath.length];
        const canonical = segments[prefixPath.length];
        const spelling = spellings.get(canonical);
        if (spelling === undefined) {
          spellings.set(canonical, entryName);
        } else if (spelling !== entryName) {
          throw new DataSourceDefinitionError(
            `'${spelling}' and '${entryName}' under '${prefix}' in ${source.name} name the same data source`,
          );
        }

        let name = seen.get(canonical);
        if (name === undefined) {
          name = entryName;
          seen.set(canonical, name);
          result.set(name, {});
        }

        const remainder = original.slice(prefixPath.length + 1).join('.');
        const bag = result.get(name);
        if (bag && remainder && !(remainder in bag)) {
          bag[remainder] = value;
        }
      }
    }

    return result;
  }

  /**
   * Collect every leaf beneath `prefix`, highest precedence first per
   * canonical name
   */
  bindProperties(prefix: string): BoundProperty[] {
    const prefixPath = canonicalPath(prefix);
    const bound = new Map<string, BoundProperty>();

    for (const source of this.environment.getPropertySources()) {
      for (const [key, value] of source.properties) {
        const segments = canonicalPath(key);
        if (
          segments.length <= prefixPath.length ||
          !startsWithPath(segments, prefixPath)
        ) {
          continue;
        }

        const name = segments.slice(prefixPath.length).join('.');
        if (!bound.has(name)) {
          bound.set(name, { name, key, value });
        }
      }
    }

    return Array.from(bound.values());
  }
}
