// Main entry point for @station-harvest/shared

// Export all types
export * from './types';

// Export all utilities
export * from './utils';

// Export config
export * from './config';

// Export weather sources
export * from './weather';

// Export harvest pipeline
export * from './harvest';

// Export station file and eligibility
export * from './stations';

// Export output formatting
export * from './output/table-format';
