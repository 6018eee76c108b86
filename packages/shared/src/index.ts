// Main entry point for @tastemaker/shared

export * from './utils/errors';
export * from './utils/fetch';
