export * from './address-validation';
export * from './api';
export * from './classified-error';
export * from './client';
export * from './directions';
export * from './distance-matrix';
export * from './elevation';
export * from './errors';
export * from './format';
export * from './geocoding';
export * from './http-transport';
export * from './legacy-status';
export * from './places';
export * from './places-new';
export * from './rate-limiter';
export * from './retry';
export * from './time-zone';
export * from './travel';
