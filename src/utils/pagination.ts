import type { Page, Post } from '@/types/social';

export function pageCountOf(total: number, pageSize: number): number {
  const size = Math.max(1, Math.floor(pageSize) || 1);
  return Math.max(1, Math.ceil(total / size));
}

export function pageOf(posts: readonly Post[], pageIndex: number, pageSize: number): Page {
  const size = Math.max(1, Math.floor(pageSize) || 1);
  const pageCount = pageCountOf(posts.length, size);
  const requested = Number.isFinite(pageIndex) ? Math.floor(pageIndex) : 0;
  const index = Math.min(Math.max(requested, 0), pageCount - 1);
  const start = index * size;

  return {
    posts: posts.slice(start, start + size),
    pageIndex: index,
    pageCount,
    hasPrevious: index > 0,
    hasNext: (index + 1) * size < posts.length,
  };
}
