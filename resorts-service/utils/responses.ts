import type { FastifyReply } from 'fastify';

import type { Notice, NoticeCategory } from 'resorts-types';

export const notices = {
  created: { category: 'success', message: 'Resort inserito ✅' },
  saved: { category: 'success', message: 'Salvato ✅' },
  deleted: { category: 'warning', message: 'Eliminato 🗑️' },
  notFound: { category: 'danger', message: 'Resort non trovato.' },
} as const satisfies Record<string, { category: NoticeCategory; message: string }>;

/**
 * 创建 303 重定向响应
 *
 * 同时写入 Location 头，页面端据此跳转并展示提示
 */
export const redirectResponse = (reply: FastifyReply, location: string, notice: Notice) => {
  reply.header('location', location);
  return {
    status: 303 as const,
    body: { location, notice: { category: notice.category, message: notice.message } },
  };
};
