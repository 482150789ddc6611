export * from './logger';
export * from './sleep';
export * from './time';
