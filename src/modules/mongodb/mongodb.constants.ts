/** DI token for the resolved Mongo settings. */
export const MONGO_CONFIG = Symbol('MONGO_CONFIG');
