export * from './temperature-row';
export * from './live-reading';
