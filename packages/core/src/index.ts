export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './http';
export * from './mapper';
export * from './client';
export * from './resolver';
export * from './writer';
export * from './exporter';
export * from './container';
