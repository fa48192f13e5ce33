import type { initServer } from '@ts-rest/fastify';

import { features, regions, resortsContract, statusChoices } from 'resorts-types';
import type { ResortCatalog } from '../catalog.js';
import { accessScore } from '../utils/resort.js';
import { notices, redirectResponse } from '../utils/responses.js';

const LIST_PATH = '/';

/** 表单页公共数据 */
const formOptions = () => ({
  regions: [...regions],
  statusChoices: [...statusChoices],
  features: [...features],
});

export const createResortsRouter = (s: ReturnType<typeof initServer>, catalog: ResortCatalog) => {
  return s.router(resortsContract, {
    list: async ({ query }) => {
      const filters = {
        q: query.q?.trim() ?? '',
        region: query.region?.trim() ?? '',
        status: query.status?.trim() ?? '',
        only_access: query.only_access ?? '',
        keep: query.keep ?? '',
      };
      const items = await catalog.list(filters);
      return {
        status: 200,
        body: {
          resorts: items,
          regions: [...regions],
          statusChoices: [...statusChoices],
          filters,
        },
      };
    },

    newForm: async () => {
      return { status: 200, body: { mode: 'new', ...formOptions(), resort: null } };
    },

    create: async ({ body, reply }) => {
      const created = await catalog.create(body);
      const response = redirectResponse(reply, LIST_PATH, notices.created);
      return { status: response.status, body: { ...response.body, id: created.id } };
    },

    editForm: async ({ params, reply }) => {
      const resort = await catalog.fetch(params.id);
      if (!resort) return redirectResponse(reply, LIST_PATH, notices.notFound);
      return { status: 200, body: { mode: 'edit', ...formOptions(), resort } };
    },

    update: async ({ params, body, reply }) => {
      const updated = await catalog.update(params.id, body);
      if (!updated) return redirectResponse(reply, LIST_PATH, notices.notFound);
      return redirectResponse(reply, `/view/${updated.id}`, notices.saved);
    },

    view: async ({ params, reply }) => {
      const resort = await catalog.fetch(params.id);
      if (!resort) return redirectResponse(reply, LIST_PATH, notices.notFound);
      return { status: 200, body: { resort, features: [...features], ...accessScore(resort) } };
    },

    delete: async ({ params, reply }) => {
      await catalog.delete(params.id);
      return redirectResponse(reply, LIST_PATH, notices.deleted);
    },
  });
};
