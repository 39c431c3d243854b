export * from './lib/errors';
export * from './lib/config';
export * from './lib/timeoutBudget';
export * from './lib/resourceStack';
export * from './lib/peerConnection';
export * from './lib/peerScripts';
export * from './lib/mockServer';
export * from './lib/harness';
