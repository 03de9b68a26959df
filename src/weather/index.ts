export * from './errors.js';
export * from './formatter.js';
export * from './openweather-client.js';
export * from './types.js';
