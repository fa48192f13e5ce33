// main.ts
import 'dotenv/config';
import Fastify from 'fastify';

import { registerResorts } from './app.js';
import { loadConfig } from './config.js';
import { createDatabase, ensureSchema } from './database.js';
import { DrizzleResortStore } from './store.js';

const app = Fastify({ logger: true });

const start = async () => {
  try {
    // 缺少 DATABASE_URL 时抛出 ConfigurationError，服务不启动
    const config = loadConfig();

    const { pool, db } = createDatabase(config);
    app.addHook('onClose', async () => {
      await pool.end();
    });

    // 建表失败同样视为致命错误，不带着不可用的数据库继续运行
    await ensureSchema(db);

    await registerResorts(app, new DrizzleResortStore(db), { activityLog: config.activityLog });

    await app.listen({ port: config.port, host: config.host });
    app.log.info(`服务器已启动，监听端口 ${config.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
