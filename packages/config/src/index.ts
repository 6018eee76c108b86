// Main entry point for @tastemaker/config package

export * from './echonest';
