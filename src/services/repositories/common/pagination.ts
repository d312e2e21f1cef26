export type CursorPageRequest = {
  limit: number;
  cursor?: string | null;
};

export type CursorPageResult<TRecord> = {
  items: TRecord[];
  hasMore: boolean;
  nextCursor: string | null;
};

export function normalizeCursor(cursor: string | null | undefined): string | null {
  return typeof cursor === 'string' && cursor.trim().length > 0 ? cursor.trim() : null;
}
