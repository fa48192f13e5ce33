import type { FastifyBaseLogger } from 'fastify';

import type { Resort, ResortForm, ResortListItem, ResortListQuery } from 'resorts-types';
import type { ActivityNote, ResortStore } from './store.js';
import { accessScore, buildResortConditions, isResortId, normalizeResortForm } from './utils/resort.js';

export interface ResortCatalogOptions {
  store: ResortStore;
  logger: FastifyBaseLogger;
  /** 新建时写入 activity_log，默认开启 */
  activityLog?: boolean;
  /** 时间来源，测试时可替换 */
  now?: () => Date;
}

/**
 * 度假村目录服务
 *
 * 路由层只调用这里的五个操作；记录不存在时返回 undefined 而不是抛出异常
 */
export class ResortCatalog {
  private readonly store: ResortStore;
  private readonly logger: FastifyBaseLogger;
  private readonly activityLog: boolean;
  private readonly now: () => Date;

  constructor(options: ResortCatalogOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.activityLog = options.activityLog ?? true;
    this.now = options.now ?? (() => new Date());
  }

  async list(query: ResortListQuery): Promise<ResortListItem[]> {
    const rows = await this.store.list(buildResortConditions(query));
    return rows.map((resort) => ({ resort, ...accessScore(resort) }));
  }

  async create(form: ResortForm): Promise<Resort> {
    const values = normalizeResortForm(form);
    const now = this.now();
    const activity: ActivityNote | null = this.activityLog
      ? { action: 'CREATED', description: `Resort "${values.name}" inserito` }
      : null;
    const created = await this.store.insert({ ...values, createdAt: now, updatedAt: now }, activity);
    this.logger.info({ resortId: created.id }, '度假村已创建');
    return created;
  }

  async fetch(id: number): Promise<Resort | undefined> {
    if (!isResortId(id)) {
      this.logger.debug({ resortId: id }, 'id 超出范围，视为不存在');
      return undefined;
    }
    const resort = await this.store.findById(id);
    if (!resort) this.logger.debug({ resortId: id }, '度假村不存在');
    return resort;
  }

  async update(id: number, form: ResortForm): Promise<Resort | undefined> {
    if (!isResortId(id)) {
      this.logger.debug({ resortId: id }, 'id 超出范围，跳过更新');
      return undefined;
    }
    const values = normalizeResortForm(form);
    const updated = await this.store.update(id, { ...values, updatedAt: this.now() });
    if (!updated) {
      this.logger.debug({ resortId: id }, '度假村不存在，跳过更新');
      return undefined;
    }
    this.logger.info({ resortId: id }, '度假村已更新');
    return updated;
  }

  /** 删除不存在（包括 id 超出范围）的记录同样视为成功 */
  async delete(id: number): Promise<void> {
    if (!isResortId(id)) return;
    await this.store.remove(id);
    this.logger.info({ resortId: id }, '度假村已删除');
  }
}
