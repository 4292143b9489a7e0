// Main exports for programmatic use
export * from './registry';
export * from './config';
export * from './notifications';
export * from './discounts';
export { createApp } from './app';
export type { App, CreateAppOptions } from './app';
