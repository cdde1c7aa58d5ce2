export * from './address';
export * from './lat-lng';
