export * from './InputValidator';
