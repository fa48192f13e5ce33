import formbody from '@fastify/formbody';
import type { FastifyInstance } from 'fastify';

import { ResortCatalog } from './catalog.js';
import { createRouter } from './routers/index.js';
import type { ResortStore } from './store.js';

export interface RegisterOptions {
  activityLog?: boolean;
  now?: () => Date;
}

/**
 * 在 Fastify 实例上注册表单解析和度假村路由
 *
 * 生产环境传入 DrizzleResortStore，测试时传入内存实现
 */
export const registerResorts = async (
  app: FastifyInstance,
  store: ResortStore,
  options: RegisterOptions = {},
): Promise<ResortCatalog> => {
  // 页面表单以 application/x-www-form-urlencoded 提交
  await app.register(formbody);

  const catalog = new ResortCatalog({
    store,
    logger: app.log,
    activityLog: options.activityLog,
    now: options.now,
  });
  await app.register(createRouter(catalog));
  return catalog;
};
