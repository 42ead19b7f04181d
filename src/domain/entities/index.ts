export * from './FileRecord';
