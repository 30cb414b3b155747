/**
 * livemark - Transport Module
 */

export { MemoryDataSource, type MemoryDataSourceOptions } from './memory';

export type { DataSource, FetchOnceOptions } from '../types';
