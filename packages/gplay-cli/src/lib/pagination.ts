/**
 * Page-token pagination shared by list commands with --paginate.
 */

export interface PageAccessors<P, I> {
  items: (page: P) => I[] | null | undefined;
  nextToken: (page: P) => string | null | undefined;
}

/**
 * Fetch pages until there is no next token, a page comes back empty or a
 * token repeats.
 */
export async function collectPages<P, I>(
  fetchPage: (pageToken: string | undefined) => Promise<P>,
  { items, nextToken }: PageAccessors<P, I>
): Promise<I[]> {
  const all: I[] = [];
  const seen = new Set<string>();
  let token: string | undefined;

  for (;;) {
    const page = await fetchPage(token);
    const pageItems = items(page) ?? [];
    all.push(...pageItems);

    const next = nextToken(page)?.trim();
    if (!next || pageItems.length === 0 || seen.has(next)) {
      return all;
    }
    seen.add(next);
    token = next;
  }
}

/** `nextPageToken` as returned by most Google list endpoints */
export function nextPageToken(page: {
  nextPageToken?: string | null;
  tokenPagination?: { nextPageToken?: string | null } | null;
}): string | null | undefined {
  return page.nextPageToken ?? page.tokenPagination?.nextPageToken;
}
