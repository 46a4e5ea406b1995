import { Type } from '@nestjs/common';
import { INJECTABLE_WATERMARK } from '@nestjs/common/constants';
import { PoolDataSource } from '../pool/pool-data-source';

/**
 * Callback applied to every data source after configuration binding and
 * before `init()`. Changes made here override bound configuration.
 */
export interface DataSourceCustomizer {
  customize(dataSource: PoolDataSource): void;
}

export type DataSourceCustomizerFn = (dataSource: PoolDataSource) => void;

/**
 * What `forRoot({ customizers })` accepts: an injectable class, an instance,
 * or a plain function
 */
export type DataSourceCustomizerProvider =
  | Type<DataSourceCustomizer>
  | DataSourceCustomizer
  | DataSourceCustomizerFn;

const CLASS_SOURCE = /^class[\s{]/;

/**
 * Classes are recognised by `@Injectable()`, a `customize` method on the
 * prototype, or `class` syntax, so property-style `customize = () => {}`
 * classes are constructed by Nest rather than called
 */
export function isCustomizerClass(
  provider: DataSourceCustomizerProvider,
): provider is Type<DataSourceCustomizer> {
  if (typeof provider !== 'function') {
    return false;
  }
  if (Reflect.hasMetadata(INJECTABLE_WATERMARK, provider)) {
    return true;
  }

  const prototype: unknown = provider.prototype;
  if (
    typeof prototype === 'object' &&
    prototype !== null &&
    'customize' in prototype &&
    typeof prototype.customize === 'function'
  ) {
    return true;
  }
  return CLASS_SOURCE.test(Function.prototype.toString.call(provider));
}

export function toCustomizer(
  provider: DataSourceCustomizer | DataSourceCustomizerFn,
): DataSourceCustomizer {
  return typeof provider === 'function' ? { customize: provider } : provider;
}
