export * from './messages.js';
export * from './response.js';
export * from './events.js';
export * from './provider.js';
