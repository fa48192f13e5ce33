import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import pino from 'pino';

import { ResortCatalog } from './catalog.js';
import { MemoryResortStore } from './testing/memory-store.js';
import { fullForm, makeResort, normalizedFullForm } from './testing/fixtures.js';

const logger = pino({ level: 'silent' });

let store: MemoryResortStore;
let catalog: ResortCatalog;
let current: Date;

beforeEach(() => {
  store = new MemoryResortStore();
  current = new Date('2024-06-01T08:00:00Z');
  catalog = new ResortCatalog({ store, logger, now: () => current });
});

describe('create', () => {
  it('归一化后写入并设置时间戳', async () => {
    const created = await catalog.create(fullForm);

    expect(created).toEqual({
      id: 1,
      ...normalizedFullForm,
      createdAt: current,
      updatedAt: current,
    });
  });

  it('写入操作日志', async () => {
    const created = await catalog.create({ name: 'Lido Azzurro' });

    expect(store.activities).toEqual([
      { id: 1, resortId: created.id, action: 'CREATED', description: 'Resort "Lido Azzurro" inserito' },
    ]);
  });

  it('关闭操作日志时不写入', async () => {
    const quiet = new ResortCatalog({ store, logger, activityLog: false, now: () => current });
    await quiet.create({ name: 'Lido Azzurro' });

    expect(store.activities).toEqual([]);
  });

  it('任何输入都会被接受', async () => {
    const created = await catalog.create({ name: '', price_week: 'abc', status: '???' });

    expect(created.name).toBe('Senza nome');
    expect(created.priceWeek).toBeNull();
    expect(created.status).toBe('valutare');
  });

  it('id 在删除后不复用', async () => {
    const first = await catalog.create({ name: 'Uno' });
    await catalog.delete(first.id);
    const second = await catalog.create({ name: 'Due' });

    expect(second.id).toBe(first.id + 1);
  });
});

describe('fetch', () => {
  it('新建后读取与归一化结果一致', async () => {
    const created = await catalog.create(fullForm);
    const fetched = await catalog.fetch(created.id);

    expect(fetched).toBeDefined();
    const { id, createdAt, updatedAt, ...rest } = fetched ?? created;
    expect(id).toBe(created.id);
    expect(createdAt).toEqual(current);
    expect(updatedAt).toEqual(current);
    expect(rest).toEqual(normalizedFullForm);
  });

  it('不存在时返回 undefined', async () => {
    await expect(catalog.fetch(42)).resolves.toBeUndefined();
  });
});

describe('update', () => {
  it('覆盖全部字段，保留 created_at', async () => {
    const created = await catalog.create(fullForm);
    const createdAt = current;
    current = new Date('2024-06-02T09:30:00Z');

    const updated = await catalog.update(created.id, { name: 'Lido del Sole 2', status: 'scartare' });

    expect(updated).toEqual({
      id: created.id,
      name: 'Lido del Sole 2',
      region: null,
      city: null,
      website: null,
      phone: null,
      email: null,
      priceWeek: null,
      pricePeriod: null,
      priceNotes: null,
      status: 'scartare',
      keepFlag: false,
      notes: null,
      wheelchairAccess: false,
      beachWalkway: false,
      beachBathroomH: false,
      beachJobChair: false,
      accessibleRoom: false,
      restaurantAccessible: false,
      poolAccessible: false,
      lift: false,
      disabledParking: false,
      stepFreePaths: false,
      staffAssistance: false,
      createdAt,
      updatedAt: current,
    });
  });

  it('updated_at 不早于上一次', async () => {
    const created = await catalog.create({ name: 'Lido' });
    current = new Date('2024-06-01T08:00:01Z');
    const updated = await catalog.update(created.id, { name: 'Lido' });

    expect(updated?.updatedAt?.getTime()).toBeGreaterThanOrEqual(created.updatedAt?.getTime() ?? 0);
    expect(updated?.createdAt).toEqual(created.createdAt);
  });

  it('不存在时返回 undefined 且不写入', async () => {
    await expect(catalog.update(7, { name: 'Fantasma' })).resolves.toBeUndefined();
    expect(store.rows.size).toBe(0);
  });
});

describe('delete', () => {
  it('删除后读取不到，重复删除不报错', async () => {
    const created = await catalog.create({ name: 'Lido' });

    await catalog.delete(created.id);
    await expect(catalog.fetch(created.id)).resolves.toBeUndefined();
    await expect(catalog.delete(created.id)).resolves.toBeUndefined();
  });

  it('级联删除操作日志', async () => {
    const kept = await catalog.create({ name: 'Resta' });
    const removed = await catalog.create({ name: 'Via' });

    await catalog.delete(removed.id);

    expect(store.activities.map((entry) => entry.resortId)).toEqual([kept.id]);
  });
});

describe('list', () => {
  it('附带无障碍得分', async () => {
    await catalog.create(fullForm);

    const [item] = await catalog.list({});
    expect(item?.have).toBe(4);
    expect(item?.total).toBe(11);
    expect(item?.resort.name).toBe('Lido del Sole');
  });

  it('only_access 只保留满足最低要求的记录', async () => {
    store.seed(makeResort({ id: 1, name: 'walkway', wheelchairAccess: true, beachBathroomH: true, beachWalkway: true }));
    store.seed(makeResort({ id: 2, name: 'job', wheelchairAccess: true, beachBathroomH: true, beachJobChair: true }));
    store.seed(makeResort({ id: 3, name: 'no-bathroom', wheelchairAccess: true, beachWalkway: true }));
    store.seed(makeResort({ id: 4, name: 'no-wheelchair', beachBathroomH: true, beachJobChair: true }));
    store.seed(makeResort({ id: 5, name: 'no-beach', wheelchairAccess: true, beachBathroomH: true, lift: true }));

    const items = await catalog.list({ only_access: '1' });

    expect(items.map((item) => item.resort.name).sort()).toEqual(['job', 'walkway']);
  });

  it('按 updated_at、created_at 降序，空值排最后', async () => {
    store.seed(makeResort({ id: 1, name: 'old', updatedAt: new Date('2024-01-01'), createdAt: new Date('2024-01-01') }));
    store.seed(makeResort({ id: 2, name: 'recent', updatedAt: new Date('2024-03-01'), createdAt: new Date('2024-01-01') }));
    store.seed(makeResort({ id: 3, name: 'tie-newer', updatedAt: new Date('2024-02-01'), createdAt: new Date('2024-01-20') }));
    store.seed(makeResort({ id: 4, name: 'tie-older', updatedAt: new Date('2024-02-01'), createdAt: new Date('2024-01-10') }));
    store.seed(makeResort({ id: 5, name: 'legacy', updatedAt: null, createdAt: new Date('2023-01-01') }));
    store.seed(makeResort({ id: 6, name: 'legacy-blank', updatedAt: null, createdAt: null }));

    const items = await catalog.list({});

    expect(items.map((item) => item.resort.name)).toEqual([
      'recent',
      'tie-newer',
      'tie-older',
      'old',
      'legacy',
      'legacy-blank',
    ]);
  });

  it('关键字不区分大小写，匹配名称、城市、备注、大区', async () => {
    store.seed(makeResort({ id: 1, name: 'Lido SOLE' }));
    store.seed(makeResort({ id: 2, name: 'A', city: 'Solemare' }));
    store.seed(makeResort({ id: 3, name: 'B', notes: 'vicino al sole' }));
    store.seed(makeResort({ id: 4, name: 'C', region: 'Sole Region' }));
    store.seed(makeResort({ id: 5, name: 'D', city: 'Bari' }));

    const items = await catalog.list({ q: ' sole ' });

    expect(items.map((item) => item.resort.id).sort()).toEqual([1, 2, 3, 4]);
  });

  it('多个条件同时生效', async () => {
    store.seed(makeResort({ id: 1, region: 'Puglia', status: 'interessante', keepFlag: true }));
    store.seed(makeResort({ id: 2, region: 'Puglia', status: 'interessante', keepFlag: false }));
    store.seed(makeResort({ id: 3, region: 'Puglia', status: 'valutare', keepFlag: true }));
    store.seed(makeResort({ id: 4, region: 'Sicilia', status: 'interessante', keepFlag: true }));

    const items = await catalog.list({ region: 'Puglia', status: 'interessante', keep: '1' });

    expect(items.map((item) => item.resort.id)).toEqual([1]);
  });

  it('空白筛选条件被忽略', async () => {
    store.seed(makeResort({ id: 1 }));
    store.seed(makeResort({ id: 2, region: 'Lazio' }));

    const items = await catalog.list({ q: '', region: '  ', status: '', keep: '', only_access: '' });

    expect(items.map((item) => item.resort.id)).toEqual([2, 1]);
  });
});

describe('id 超出 integer 范围', () => {
  it.each([0, -1, 2147483648, 99999999999, 1e20])('%p 视为不存在，不访问存储', async (id) => {
    const findById = jest.spyOn(store, 'findById');
    const update = jest.spyOn(store, 'update');
    const remove = jest.spyOn(store, 'remove');

    await expect(catalog.fetch(id)).resolves.toBeUndefined();
    await expect(catalog.update(id, { name: 'Fantasma' })).resolves.toBeUndefined();
    await expect(catalog.delete(id)).resolves.toBeUndefined();

    expect(findById).not.toHaveBeenCalled();
    expect(update).not.toHaveBeenCalled();
    expect(remove).not.toHaveBeenCalled();
  });

  it('上限本身仍可读取', async () => {
    store.seed(makeResort({ id: 2147483647, name: 'Ultimo' }));

    const fetched = await catalog.fetch(2147483647);

    expect(fetched?.name).toBe('Ultimo');
  });
});
