import 'reflect-metadata';

export * from './types';
export * from './errors';
export * from './logger';
export * from './utils';
export * from './schemas';
export * from './reader';
export * from './timeline';
export * from './related';
export * from './assets';
export * from './renderer';
export * from './journal';
export * from './backoff';
export * from './queue';
export * from './session';
export * from './fetcher';
export * from './normalizer';
export * from './exporter';
export * from './pipeline';
export * from './config';
export * from './git';
export * from './tokens';
export { createContainer } from './container';
