import { Inject } from '@nestjs/common';
import { DEFAULT_DATA_SOURCE_NAME } from './datasource.constants';
import { separatedToCamel } from './environment/relaxed-names';

/**
 * Injection token for a configured data source
 * getDataSourceToken('orders-db') -> 'ordersDb'
 */
export function getDataSourceToken(key?: string): string {
  return key ? separatedToCamel(key) : DEFAULT_DATA_SOURCE_NAME;
}

export const InjectDataSource = (key?: string) =>
  Inject(getDataSourceToken(key));
