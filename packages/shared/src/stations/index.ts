export * from './station-file';
export * from './eligibility';
