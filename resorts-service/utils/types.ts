import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

/** 数据库实例类型 */
export type DbInstance = NodePgDatabase;
