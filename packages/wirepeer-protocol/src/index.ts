export * from './lib/errors';
export * from './lib/messages';
export * from './lib/framer';
