import type { Resort, ResortInput } from 'resorts-types';

/** 全部字段取默认值的记录，按需覆盖 */
export const makeResort = (overrides: Partial<Resort> & { id: number }): Resort => ({
  name: 'Lido Prova',
  region: null,
  city: null,
  website: null,
  phone: null,
  email: null,
  priceWeek: null,
  pricePeriod: null,
  priceNotes: null,
  status: 'valutare',
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
  createdAt: new Date('2024-05-01T10:00:00Z'),
  updatedAt: new Date('2024-05-01T10:00:00Z'),
  ...overrides,
});

/** 一个填写完整的表单 */
export const fullForm = {
  name: '  Lido del Sole  ',
  region: 'Puglia',
  city: ' Otranto ',
  website: 'https://lido.example.com',
  phone: '0836 000000',
  email: 'info@lido.example.com',
  price_week: '1250,50',
  price_period: 'Luglio',
  price_notes: 'colazione inclusa',
  status: 'interessante',
  keep_flag: 'on',
  notes: 'spiaggia attrezzata',
  wheelchair_access: 'on',
  beach_walkway: 'on',
  beach_bathroom_h: '1',
  lift: 'yes',
};

/** fullForm 归一化后的结果 */
export const normalizedFullForm = {
  name: 'Lido del Sole',
  region: 'Puglia',
  city: 'Otranto',
  website: 'https://lido.example.com',
  phone: '0836 000000',
  email: 'info@lido.example.com',
  priceWeek: 1250.5,
  pricePeriod: 'Luglio',
  priceNotes: 'colazione inclusa',
  status: 'interessante',
  keepFlag: true,
  notes: 'spiaggia attrezzata',
  wheelchairAccess: true,
  beachWalkway: true,
  beachBathroomH: true,
  beachJobChair: false,
  accessibleRoom: false,
  restaurantAccessible: false,
  poolAccessible: false,
  lift: true,
  disabledParking: false,
  stepFreePaths: false,
  staffAssistance: false,
} satisfies ResortInput;
