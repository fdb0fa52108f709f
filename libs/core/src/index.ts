export * from './core.module';
export * from './env.schema';
export * from './errors';
export * from './key-value-store';
export * from './logging';
export * from './redis.connection';
export * from './redis.service';
