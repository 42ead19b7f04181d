export * from './StreamErrors';
