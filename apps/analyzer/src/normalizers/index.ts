export * from './temperature-row.normalizer';
