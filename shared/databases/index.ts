export * from './postgres/connection';
