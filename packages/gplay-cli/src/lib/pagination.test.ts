import { describe, it, expect, vi } from "vitest";
import { collectPages, nextPageToken } from "./pagination.js";

interface Page {
  reviews?: string[];
  tokenPagination?: { nextPageToken?: string };
}

describe("collectPages", () => {
  it("follows tokens until the last page", async () => {
    const pages: Record<string, Page> = {
      first: { reviews: ["r1", "r2"], tokenPagination: { nextPageToken: "t2" } },
      t2: { reviews: ["r3"], tokenPagination: {} },
    };
    const fetchPage = vi.fn(async (token: string | undefined) => pages[token ?? "first"]);

    const items = await collectPages(fetchPage, {
      items: (page: Page) => page.reviews,
      nextToken: nextPageToken,
    });

    expect(items).toEqual(["r1", "r2", "r3"]);
    expect(fetchPage.mock.calls.map((c) => c[0])).toEqual([undefined, "t2"]);
  });

  it("stops on an empty page or a repeated token", async () => {
    const empty = vi.fn(async (): Promise<Page> => ({ reviews: [], tokenPagination: { nextPageToken: "x" } }));
    await expect(collectPages(empty, { items: (p: Page) => p.reviews, nextToken: nextPageToken })).resolves.toEqual([]);
    expect(empty).toHaveBeenCalledTimes(1);

    const looping = vi.fn(async (): Promise<Page> => ({ reviews: ["r"], tokenPagination: { nextPageToken: "same" } }));
    await expect(
      collectPages(looping, { items: (p: Page) => p.reviews, nextToken: nextPageToken })
    ).resolves.toEqual(["r", "r"]);
    expect(looping).toHaveBeenCalledTimes(2);
  });
});
