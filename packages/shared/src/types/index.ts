export * from './station';
export * from './observation';
export * from './outcome';
