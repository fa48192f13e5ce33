import { SQL, and, desc, eq, ilike, or, sql } from 'drizzle-orm';
import * as v from 'valibot';

import { DEFAULT_STATUS, ResortStatusSchema, features } from 'resorts-types';
import type { AccessScore, FeatureKey, FormValue, Resort, ResortForm, ResortInput, ResortListQuery } from 'resorts-types';
import { resorts } from '../schema.js';

export const UNNAMED_RESORT = 'Senza nome';

/** resorts.id 是 PostgreSQL integer，超出范围的值不可能对应任何记录 */
export const MAX_RESORT_ID = 2147483647;

export const isResortId = (id: number): boolean => Number.isInteger(id) && id >= 1 && id <= MAX_RESORT_ID;

const CHECKED_VALUES = ['1', 'on', 'true', 'yes'];

// 可选 +/- 号、整数部分、可选小数部分
const PriceSchema = v.pipe(v.string(), v.regex(/^[+-]?(?:\d+\.?\d*|\.\d+)$/u));

// =============================================================================
// 表单归一化
// =============================================================================

/** 同名字段出现多次时取第一个 */
const firstValue = (value: FormValue | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/** 去除首尾空白，空字符串视为未填写 */
export const cleanText = (value: FormValue | undefined): string | null => {
  const trimmed = (firstValue(value) ?? '').trim();
  return trimmed === '' ? null : trimmed;
};

/** 复选框：1 / on / true / yes（不区分大小写）为真，其余包括未提交均为假 */
export const isChecked = (value: FormValue | undefined): boolean => {
  const raw = firstValue(value);
  return raw !== undefined && CHECKED_VALUES.includes(raw.toLowerCase());
};

/**
 * 解析每周价格
 *
 * 逗号视为小数点（"12,50" -> 12.5），无法解析时返回 null，不报错
 */
export const parsePrice = (value: FormValue | undefined): number | null => {
  const text = cleanText(value);
  if (text === null) return null;
  const normalized = text.replace(/,/g, '.');
  if (!v.is(PriceSchema, normalized)) return null;
  const price = Number(normalized);
  return Number.isFinite(price) ? price : null;
};

/**
 * 将原始表单转换为可写入的记录
 *
 * 新建和编辑共用；任何输入都会被接受，不存在校验失败的情况
 */
export const normalizeResortForm = (form: ResortForm): ResortInput => {
  const status = cleanText(form.status);

  return {
    name: cleanText(form.name) ?? UNNAMED_RESORT,
    region: cleanText(form.region),
    city: cleanText(form.city),
    website: cleanText(form.website),
    phone: cleanText(form.phone),
    email: cleanText(form.email),

    priceWeek: parsePrice(form.price_week),
    pricePeriod: cleanText(form.price_period),
    priceNotes: cleanText(form.price_notes),

    status: v.is(ResortStatusSchema, status) ? status : DEFAULT_STATUS,
    keepFlag: isChecked(form.keep_flag),

    notes: cleanText(form.notes),

    // 复选框字段名与 features 中的 field 一致
    wheelchairAccess: isChecked(form.wheelchair_access),
    beachWalkway: isChecked(form.beach_walkway),
    beachBathroomH: isChecked(form.beach_bathroom_h),
    beachJobChair: isChecked(form.beach_job_chair),
    accessibleRoom: isChecked(form.accessible_room),
    restaurantAccessible: isChecked(form.restaurant_accessible),
    poolAccessible: isChecked(form.pool_accessible),
    lift: isChecked(form.lift),
    disabledParking: isChecked(form.disabled_parking),
    stepFreePaths: isChecked(form.step_free_paths),
    staffAssistance: isChecked(form.staff_assistance),
  };
};

// =============================================================================
// 无障碍得分
// =============================================================================

/** 11 项设施中已具备的数量，所有设施权重相同 */
export const accessScore = (resort: Pick<Resort, FeatureKey>): AccessScore => ({
  have: features.filter((feature) => resort[feature.key]).length,
  total: features.length,
});

// =============================================================================
// 列表筛选
// =============================================================================

export type ResortCondition =
  | { kind: 'search'; term: string }
  | { kind: 'region'; region: string }
  | { kind: 'status'; status: string }
  | { kind: 'keep' }
  | { kind: 'minimumAccess' };

/**
 * 将查询参数转换为筛选条件列表，各条件之间为 AND
 *
 * 空白参数直接忽略，不会变成"匹配空值"
 */
export const buildResortConditions = (query: ResortListQuery): ResortCondition[] => {
  const conditions: ResortCondition[] = [];
  const term = cleanText(query.q);
  const region = cleanText(query.region);
  const status = cleanText(query.status);

  if (term !== null) conditions.push({ kind: 'search', term });
  if (region !== null) conditions.push({ kind: 'region', region });
  if (status !== null) conditions.push({ kind: 'status', status });
  if (isChecked(query.keep)) conditions.push({ kind: 'keep' });
  if (isChecked(query.only_access)) conditions.push({ kind: 'minimumAccess' });

  return conditions;
};

/** ILIKE 通配符转义，关键字按字面匹配 */
export const escapeLike = (term: string): string => term.replace(/[\\%_]/g, (ch) => `\\${ch}`);

/**
 * 最低无障碍要求：轮椅可达 + 无障碍卫生间 + (海滩步道 或 JOB 椅)
 */
export const minimumAccessSql = (): SQL | undefined =>
  and(
    eq(resorts.wheelchairAccess, true),
    eq(resorts.beachBathroomH, true),
    or(eq(resorts.beachWalkway, true), eq(resorts.beachJobChair, true)),
  );

export const conditionToSql = (condition: ResortCondition): SQL | undefined => {
  switch (condition.kind) {
    case 'search': {
      const pattern = `%${escapeLike(condition.term)}%`;
      return or(
        ilike(resorts.name, pattern),
        ilike(resorts.city, pattern),
        ilike(resorts.notes, pattern),
        ilike(resorts.region, pattern),
      );
    }
    case 'region':
      return eq(resorts.region, condition.region);
    case 'status':
      return sql`${resorts.status} = ${condition.status}`;
    case 'keep':
      return eq(resorts.keepFlag, true);
    case 'minimumAccess':
      return minimumAccessSql();
  }
};

export const buildWhereSql = (conditions: readonly ResortCondition[]): SQL | undefined =>
  and(...conditions.map(conditionToSql));

/** 最近修改的在前，空时间排在最后；id 作为最终排序依据 */
export const resortOrderBy = (): SQL[] => [
  sql`${resorts.updatedAt} desc nulls last`,
  sql`${resorts.createdAt} desc nulls last`,
  desc(resorts.id),
];
