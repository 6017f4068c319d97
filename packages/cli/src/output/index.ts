export * from './table';
export * from './renderer';
