export * from './analysis.exception';
