/**
 * 无障碍海滨度假村目录 —— 前后端共享的类型与接口定义
 *
 * - 固定数据：意大利大区列表、评估状态、11 项无障碍设施
 * - 类型：使用 Valibot 定义记录、表单、列表查询和响应 schema
 * - 接口：ts-rest 合约，描述列表 / 新建 / 编辑 / 详情 / 删除五组路由
 * - 表单以 application/x-www-form-urlencoded 提交，字段名沿用 snake_case
 */

import * as v from 'valibot';
import { initContract } from '@ts-rest/core';

// 1. 固定数据

export const regions = [
  'Abruzzo',
  'Basilicata',
  'Calabria',
  'Campania',
  'Emilia-Romagna',
  'Friuli-Venezia Giulia',
  'Lazio',
  'Liguria',
  'Lombardia',
  'Marche',
  'Molise',
  'Piemonte',
  'Puglia',
  'Sardegna',
  'Sicilia',
  'Toscana',
  'Trentino-Alto Adige',
  'Umbria',
  "Valle d'Aosta",
  'Veneto',
] as const;

export const resortStatus = ['valutare', 'interessante', 'scartare'] as const;

export type ResortStatus = (typeof resortStatus)[number];

export const DEFAULT_STATUS: ResortStatus = 'valutare';

export const statusChoices: readonly { value: ResortStatus; label: string }[] = [
  { value: 'valutare', label: 'Da valutare' },
  { value: 'interessante', label: 'Interessante' },
  { value: 'scartare', label: 'Scartare' },
];

export const featureKeys = [
  'wheelchairAccess',
  'beachWalkway',
  'beachBathroomH',
  'beachJobChair',
  'accessibleRoom',
  'restaurantAccessible',
  'poolAccessible',
  'lift',
  'disabledParking',
  'stepFreePaths',
  'staffAssistance',
] as const;

export type FeatureKey = (typeof featureKeys)[number];

export interface Feature {
  key: FeatureKey;
  /** 表单字段名 */
  field: string;
  label: string;
}

// 顺序即页面展示顺序
export const features: readonly Feature[] = [
  { key: 'wheelchairAccess', field: 'wheelchair_access', label: 'Accessibile in carrozzina' },
  { key: 'beachWalkway', field: 'beach_walkway', label: 'Passerella per il mare' },
  { key: 'beachBathroomH', field: 'beach_bathroom_h', label: 'Bagno H (spiaggia/struttura)' },
  { key: 'beachJobChair', field: 'beach_job_chair', label: 'Sedia JOB' },
  { key: 'accessibleRoom', field: 'accessible_room', label: 'Camera accessibile' },
  { key: 'restaurantAccessible', field: 'restaurant_accessible', label: 'Ristorante accessibile' },
  { key: 'poolAccessible', field: 'pool_accessible', label: 'Piscina accessibile' },
  { key: 'lift', field: 'lift', label: 'Ascensore' },
  { key: 'disabledParking', field: 'disabled_parking', label: 'Parcheggio disabili' },
  { key: 'stepFreePaths', field: 'step_free_paths', label: 'Percorsi senza barriere' },
  { key: 'staffAssistance', field: 'staff_assistance', label: 'Assistenza/servizi inclusivi' },
];

// 2. 类型定义 (Valibot schemas)

export const vTimestamps = () => ({
  createdAt: v.nullable(v.date('无效日期')), // 创建时间，由服务端写入
  updatedAt: v.nullable(v.date('无效日期')), // 更新时间，每次修改都会刷新
});

export const ParamIdSchema = v.pipe(v.string(), v.toNumber(), v.integer());

export const ResortStatusSchema = v.picklist(resortStatus, '无效状态');

export const ResortSchema = v.object({
  id: v.pipe(v.number(), v.integer(), v.minValue(1, 'ID不能为空')),
  name: v.pipe(v.string(), v.minLength(1, '名称不能为空')),
  region: v.nullable(v.string()), // 不强制属于 regions
  city: v.nullable(v.string()),
  website: v.nullable(v.string()),
  phone: v.nullable(v.string()),
  email: v.nullable(v.string()),
  priceWeek: v.nullable(v.number()), // 每周价格
  pricePeriod: v.nullable(v.string()),
  priceNotes: v.nullable(v.string()),
  status: ResortStatusSchema,
  keepFlag: v.boolean(), // 备选标记，与 status 无关
  notes: v.nullable(v.string()),
  wheelchairAccess: v.boolean(),
  beachWalkway: v.boolean(),
  beachBathroomH: v.boolean(),
  beachJobChair: v.boolean(),
  accessibleRoom: v.boolean(),
  restaurantAccessible: v.boolean(),
  poolAccessible: v.boolean(),
  lift: v.boolean(),
  disabledParking: v.boolean(),
  stepFreePaths: v.boolean(),
  staffAssistance: v.boolean(),
  ...vTimestamps(),
});

export type Resort = v.InferOutput<typeof ResortSchema>;

// 表单归一化后的结果，id 和时间戳由服务端分配
export const ResortInputSchema = v.omit(ResortSchema, ['id', 'createdAt', 'updatedAt']);

export type ResortInput = v.InferOutput<typeof ResortInputSchema>;

// 原始表单：同名字段出现多次时为数组
export const FormValueSchema = v.union([v.string(), v.array(v.string())]);

export const ResortFormSchema = v.record(v.string(), FormValueSchema);

export type FormValue = v.InferOutput<typeof FormValueSchema>;
export type ResortForm = v.InferOutput<typeof ResortFormSchema>;

export const ResortListQuerySchema = v.object({
  q: v.optional(v.string()), // 关键字，匹配名称 / 城市 / 备注 / 大区
  region: v.optional(v.string()),
  status: v.optional(v.string()),
  only_access: v.optional(v.string()), // 真值时只保留满足最低无障碍要求的记录
  keep: v.optional(v.string()), // 真值时只保留备选记录
});

export type ResortListQuery = v.InferOutput<typeof ResortListQuerySchema>;

export const AccessScoreSchema = v.object({
  have: v.pipe(v.number(), v.integer(), v.minValue(0)),
  total: v.pipe(v.number(), v.integer()),
});

export type AccessScore = v.InferOutput<typeof AccessScoreSchema>;

export const ResortListItemSchema = v.object({
  resort: ResortSchema,
  ...AccessScoreSchema.entries,
});

export type ResortListItem = v.InferOutput<typeof ResortListItemSchema>;

const StatusChoiceSchema = v.object({ value: ResortStatusSchema, label: v.string() });

const FeatureSchema = v.object({
  key: v.picklist(featureKeys),
  field: v.string(),
  label: v.string(),
});

export const ResortListResponseSchema = v.object({
  resorts: v.array(ResortListItemSchema),
  regions: v.array(v.string()),
  statusChoices: v.array(StatusChoiceSchema),
  // 回显过滤条件，未填写的为空字符串
  filters: v.object({
    q: v.string(),
    region: v.string(),
    status: v.string(),
    only_access: v.string(),
    keep: v.string(),
  }),
});

export const ResortFormPageSchema = v.object({
  mode: v.picklist(['new', 'edit']),
  regions: v.array(v.string()),
  statusChoices: v.array(StatusChoiceSchema),
  features: v.array(FeatureSchema),
  resort: v.nullable(ResortSchema),
});

export const ResortDetailSchema = v.object({
  resort: ResortSchema,
  features: v.array(FeatureSchema),
  ...AccessScoreSchema.entries,
});

export const noticeCategory = ['success', 'warning', 'danger'] as const;

export type NoticeCategory = (typeof noticeCategory)[number];

export const NoticeSchema = v.object({
  category: v.picklist(noticeCategory),
  message: v.string(),
});

export type Notice = v.InferOutput<typeof NoticeSchema>;

// 303 重定向响应：Location 头之外，body 里也带上目标地址和提示
export const RedirectResponseSchema = v.object({
  location: v.string(),
  notice: NoticeSchema,
});

export const CreatedRedirectResponseSchema = v.object({
  ...RedirectResponseSchema.entries,
  id: v.pipe(v.number(), v.integer()),
});

// 通用错误响应 Schema
export const ErrorResponseSchema = v.object({ message: v.string() });

const CommonResponseErrors = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// 3. API定义 (ts-rest格式，整合Valibot schemas)
const c = initContract();

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export const resortsContract = c.router(
  {
    list: {
      method: 'GET',
      path: '/',
      query: ResortListQuerySchema,
      responses: {
        200: ResortListResponseSchema,
      },
      summary: '度假村列表（支持关键字、大区、状态、备选、最低无障碍筛选）',
    },
    newForm: {
      method: 'GET',
      path: '/new',
      responses: {
        200: ResortFormPageSchema,
      },
      summary: '新建表单所需数据',
    },
    create: {
      method: 'POST',
      path: '/new',
      contentType: FORM_CONTENT_TYPE,
      body: ResortFormSchema,
      responses: {
        303: CreatedRedirectResponseSchema,
      },
      summary: '提交新建，成功后重定向到列表',
    },
    editForm: {
      method: 'GET',
      path: '/edit/:id',
      pathParams: v.object({ id: ParamIdSchema }),
      responses: {
        200: ResortFormPageSchema,
        303: RedirectResponseSchema,
      },
      summary: '编辑表单所需数据，记录不存在时重定向到列表',
    },
    update: {
      method: 'POST',
      path: '/edit/:id',
      pathParams: v.object({ id: ParamIdSchema }),
      contentType: FORM_CONTENT_TYPE,
      body: ResortFormSchema,
      responses: {
        303: RedirectResponseSchema,
      },
      summary: '提交编辑，成功后重定向到详情页',
    },
    view: {
      method: 'GET',
      path: '/view/:id',
      pathParams: v.object({ id: ParamIdSchema }),
      responses: {
        200: ResortDetailSchema,
        303: RedirectResponseSchema,
      },
      summary: '详情（含无障碍得分）',
    },
    delete: {
      method: 'POST',
      path: '/delete/:id',
      pathParams: v.object({ id: ParamIdSchema }),
      body: c.noBody(),
      responses: {
        303: RedirectResponseSchema,
      },
      summary: '删除，记录不存在也视为成功',
    },
  },
  { commonResponses: CommonResponseErrors },
);
