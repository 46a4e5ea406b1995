/**
 * Bean name used when no named data sources are configured
 */
export const DEFAULT_DATA_SOURCE_NAME = 'dataSource';

/**
 * Appended to generated names to form an alias
 */
export const DATA_SOURCE_SUFFIX = 'DataSource';

/**
 * Properties shared by every pool
 */
export const POOL_PREFIX = 'database.pool';

/**
 * Map of pool name to property bag; any entry switches to multiple pools
 */
export const DATA_SOURCES_PREFIX = `${POOL_PREFIX}.data-sources`;

export const DATA_SOURCE_ENVIRONMENT = 'DATA_SOURCE_ENVIRONMENT';
export const DATA_SOURCE_CUSTOMIZERS = 'DATA_SOURCE_CUSTOMIZERS';
export const DATA_SOURCE_DEFINITIONS = 'DATA_SOURCE_DEFINITIONS';
