export * from './object-store';
export { TABLES, JUNCTION_TABLE } from './schema';
