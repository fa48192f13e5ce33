// =============================================================================
// 导入 Drizzle ORM 核心模块
// =============================================================================
import {
  pgTable, // PostgreSQL 表定义函数
  serial, // 自增序列主键
  text, // 文本类型
  integer, // 整数类型
  numeric, // 精确数值类型（用于价格）
  boolean, // 布尔类型（无障碍设施）
  timestamp, // 时间戳类型
} from 'drizzle-orm/pg-core';

import type { ResortStatus } from 'resorts-types';

// =============================================================================
// 辅助函数
// =============================================================================

/**
 * 时间戳字段生成器
 *
 * 两个字段都由服务在写入时显式赋值，数据库不提供默认值；
 * 旧数据可能为空，排序时空值排在最后。
 */
const timestamps = () => ({
  createdAt: timestamp('created_at'),
  updatedAt: timestamp('updated_at'),
});

/** 无障碍设施字段，默认 false 且不可为空 */
const feature = (name: string) => boolean(name).notNull().default(false);

// =============================================================================
// 数据表定义
// =============================================================================

/**
 * 度假村表 (resorts)
 *
 * 字段说明：
 * - id: 自增主键，删除后不复用
 * - name: 名称，表单为空时写入 "Senza nome"
 * - region: 意大利大区，不做约束
 * - priceWeek: 每周价格，无法解析时为空
 * - status: 评估状态（valutare/interessante/scartare）
 * - keepFlag: 备选标记
 * - 其余 11 个布尔字段为无障碍设施
 *
 * 列定义需与 database.ts 中的建表语句保持一致（database.test.ts 会比对）
 */
export const resorts = pgTable('resorts', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  region: text('region'),
  city: text('city'),
  website: text('website'),
  phone: text('phone'),
  email: text('email'),

  priceWeek: numeric('price_week', { mode: 'number' }),
  pricePeriod: text('price_period'),
  priceNotes: text('price_notes'),

  status: text('status').$type<ResortStatus>().notNull().default('valutare'),
  keepFlag: boolean('keep_flag').notNull().default(false),

  notes: text('notes'),

  wheelchairAccess: feature('wheelchair_access'),
  beachWalkway: feature('beach_walkway'),
  beachBathroomH: feature('beach_bathroom_h'),
  beachJobChair: feature('beach_job_chair'),
  accessibleRoom: feature('accessible_room'),
  restaurantAccessible: feature('restaurant_accessible'),
  poolAccessible: feature('pool_accessible'),
  lift: feature('lift'),
  disabledParking: feature('disabled_parking'),
  stepFreePaths: feature('step_free_paths'),
  staffAssistance: feature('staff_assistance'),

  ...timestamps(),
});

/**
 * 操作日志表 (activity_log)
 *
 * 只追加、不回读。删除度假村时级联删除。
 */
export const activityLog = pgTable('activity_log', {
  id: serial('id').primaryKey(),
  resortId: integer('resort_id')
    .notNull()
    .references(() => resorts.id, { onDelete: 'cascade' }),
  action: text('action').notNull(),
  description: text('description'),
  createdAt: timestamp('created_at').defaultNow(),
});
