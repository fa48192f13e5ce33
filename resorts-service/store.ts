import { eq } from 'drizzle-orm';

import type { Resort, ResortInput } from 'resorts-types';
import { activityLog, resorts } from './schema.js';
import type { DbInstance } from './utils/types.js';
import { buildWhereSql, resortOrderBy } from './utils/resort.js';
import type { ResortCondition } from './utils/resort.js';

export interface ActivityNote {
  action: string;
  description: string;
}

export type NewResort = ResortInput & { createdAt: Date; updatedAt: Date };

export type ResortChanges = ResortInput & { updatedAt: Date };

/**
 * 度假村存储接口
 *
 * 目录服务只通过这里读写数据表
 */
export interface ResortStore {
  /** 按条件筛选，已排好序 */
  list(conditions: readonly ResortCondition[]): Promise<Resort[]>;
  /** 插入一条记录；activity 不为空时在同一事务中写入操作日志 */
  insert(values: NewResort, activity: ActivityNote | null): Promise<Resort>;
  findById(id: number): Promise<Resort | undefined>;
  /** 整行覆盖（created_at 除外），记录不存在时返回 undefined */
  update(id: number, values: ResortChanges): Promise<Resort | undefined>;
  /** 删除不存在的记录不报错 */
  remove(id: number): Promise<void>;
}

export class DrizzleResortStore implements ResortStore {
  constructor(private readonly db: DbInstance) {}

  /** 列表查询（便于测试时检查生成的 SQL） */
  listQuery(conditions: readonly ResortCondition[]) {
    return this.db
      .select()
      .from(resorts)
      .where(buildWhereSql(conditions))
      .orderBy(...resortOrderBy());
  }

  async list(conditions: readonly ResortCondition[]): Promise<Resort[]> {
    return this.listQuery(conditions);
  }

  async insert(values: NewResort, activity: ActivityNote | null): Promise<Resort> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx.insert(resorts).values(values).returning();
      if (!created) throw new Error('度假村写入失败');
      if (activity) {
        await tx.insert(activityLog).values({ resortId: created.id, ...activity });
      }
      return created;
    });
  }

  async findById(id: number): Promise<Resort | undefined> {
    const [resort] = await this.db.select().from(resorts).where(eq(resorts.id, id)).limit(1);
    return resort;
  }

  async update(id: number, values: ResortChanges): Promise<Resort | undefined> {
    const [updated] = await this.db.update(resorts).set(values).where(eq(resorts.id, id)).returning();
    return updated;
  }

  async remove(id: number): Promise<void> {
    await this.db.delete(resorts).where(eq(resorts.id, id));
  }
}
