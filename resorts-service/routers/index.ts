import { initServer } from '@ts-rest/fastify';

import type { ResortCatalog } from '../catalog.js';
import { createResortsRouter } from './resorts.router.js';

/**
 * 创建路由插件
 *
 * 目录服务由外部注入，测试时可替换存储实现
 */
export const createRouter = (catalog: ResortCatalog) => {
  const s = initServer();

  const router = createResortsRouter(s, catalog);

  return s.plugin(router);
};
