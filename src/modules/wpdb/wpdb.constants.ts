/** DI token for the resolved connection settings. */
export const WPDB_CONFIG = Symbol('WPDB_CONFIG');
