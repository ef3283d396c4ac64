export * from './protocol';
export * from './models';
export * from './events';
