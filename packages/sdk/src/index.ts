export * from './api-client';
export * from './models';
export * from './state/authState';
export * from './state/compatibility';
export * from './state/discoverCache';
export * from './state/profileSetup';
