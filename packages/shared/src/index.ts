export * from './errors';
export * from './metadata';
export * from './messages';
export * from './settings';
