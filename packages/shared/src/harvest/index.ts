export * from './retry';
export * from './batch-downloader';
export * from './reconcile';
export * from './station-runner';
