export * from './lib/errors';
export * from './lib/connInfo';
export * from './lib/clientLibrary';
export * from './lib/pgClientLibrary';
export * from './lib/clientConnection';
