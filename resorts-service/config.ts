import * as v from 'valibot';

import { ConfigurationError } from './utils/errors.js';

const DISABLED_VALUES = ['0', 'off', 'false', 'no'];

const EnvSchema = v.object({
  // 未设置时按空字符串处理，统一由 nonEmpty 报错
  DATABASE_URL: v.pipe(v.optional(v.string(), ''), v.trim(), v.nonEmpty('DATABASE_URL non configurato')),
  RESORTS_PORT: v.optional(
    v.pipe(v.string(), v.toNumber(), v.integer('RESORTS_PORT 必须是整数'), v.minValue(0), v.maxValue(65535)),
    '5000',
  ),
  RESORTS_HOST: v.optional(v.pipe(v.string(), v.nonEmpty()), '0.0.0.0'),
  RESORTS_ACTIVITY_LOG: v.optional(v.string(), '1'),
  NODE_ENV: v.optional(v.string(), 'production'),
});

export interface Config {
  databaseUrl: string;
  port: number;
  host: string;
  /** 新建时是否写入 activity_log */
  activityLog: boolean;
  /** 开发环境输出 SQL 日志 */
  logQueries: boolean;
}

/**
 * 从环境变量读取配置
 *
 * @throws ConfigurationError 缺少 DATABASE_URL 或端口非法
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const result = v.safeParse(EnvSchema, env);
  if (!result.success) {
    const [issue] = result.issues;
    throw new ConfigurationError(issue.message);
  }
  const parsed = result.output;
  return {
    databaseUrl: parsed.DATABASE_URL,
    port: parsed.RESORTS_PORT,
    host: parsed.RESORTS_HOST,
    activityLog: !DISABLED_VALUES.includes(parsed.RESORTS_ACTIVITY_LOG.trim().toLowerCase()),
    logQueries: parsed.NODE_ENV === 'development',
  };
};
