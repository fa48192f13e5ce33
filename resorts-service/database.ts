// PostgreSQL 连接池
import { Pool } from 'pg';
// Drizzle ORM PostgreSQL 驱动
import { drizzle } from 'drizzle-orm/node-postgres';
import { sql } from 'drizzle-orm';

import type { Config } from './config.js';
import type { DbInstance } from './utils/types.js';

/**
 * 创建连接池和 Drizzle 实例
 *
 * 连接按需从池中取出，每条语句（或每个事务）结束后归还
 */
export const createDatabase = (config: Pick<Config, 'databaseUrl' | 'logQueries'>) => {
  const pool = new Pool({
    connectionString: config.databaseUrl,
  });
  const db: DbInstance = drizzle({
    client: pool,
    logger: config.logQueries, // 开发环境启用日志
  });
  return { pool, db };
};

/** resorts 建表语句，列定义与 schema.ts 一致 */
export const createResortsTableSql = sql`
  CREATE TABLE IF NOT EXISTS resorts (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    region TEXT,
    city TEXT,
    website TEXT,
    phone TEXT,
    email TEXT,

    price_week NUMERIC,
    price_period TEXT,
    price_notes TEXT,

    status TEXT NOT NULL DEFAULT 'valutare',
    keep_flag BOOLEAN NOT NULL DEFAULT FALSE,

    notes TEXT,

    wheelchair_access BOOLEAN NOT NULL DEFAULT FALSE,
    beach_walkway BOOLEAN NOT NULL DEFAULT FALSE,
    beach_bathroom_h BOOLEAN NOT NULL DEFAULT FALSE,
    beach_job_chair BOOLEAN NOT NULL DEFAULT FALSE,
    accessible_room BOOLEAN NOT NULL DEFAULT FALSE,
    restaurant_accessible BOOLEAN NOT NULL DEFAULT FALSE,
    pool_accessible BOOLEAN NOT NULL DEFAULT FALSE,
    lift BOOLEAN NOT NULL DEFAULT FALSE,
    disabled_parking BOOLEAN NOT NULL DEFAULT FALSE,
    step_free_paths BOOLEAN NOT NULL DEFAULT FALSE,
    staff_assistance BOOLEAN NOT NULL DEFAULT FALSE,

    created_at TIMESTAMP,
    updated_at TIMESTAMP
  )
`;

export const createActivityLogTableSql = sql`
  CREATE TABLE IF NOT EXISTS activity_log (
    id SERIAL PRIMARY KEY,
    resort_id INTEGER NOT NULL REFERENCES resorts(id) ON DELETE CASCADE,
    action TEXT NOT NULL,
    description TEXT,
    created_at TIMESTAMP DEFAULT NOW()
  )
`;

/**
 * 建表（已存在则跳过）
 *
 * 启动时执行一次，失败直接抛出，由调用方决定退出进程
 */
export const ensureSchema = async (db: DbInstance): Promise<void> => {
  await db.execute(createResortsTableSql);
  await db.execute(createActivityLogTableSql);
};
