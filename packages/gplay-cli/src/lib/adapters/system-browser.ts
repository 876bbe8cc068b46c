import open from "open";
import type { BrowserService } from "../ports/browser.js";

/** Default browser via `open`, without waiting for the browser to exit. */
export const systemBrowser: BrowserService = {
  async open(url) {
    await open(url, { wait: false });
  },
};
