/**
 * Background warm-up of the item cache after a workspace opens.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { errorMessage } from "./errors.js";
import type { FileStore } from "./file-store.js";
import { getLogger } from "./logging.js";

const log = getLogger("cache-warmer");

/**
 * Load every item once so later lookups hit the cache. Yields to the event
 * loop between items; per-item failures are logged and skipped. Resolves
 * with the number of items loaded.
 */
export async function warmFileStore(store: FileStore): Promise<number> {
  const start = Date.now();
  let count = 0;
  for (const storePath of store.walkItems()) {
    await yieldToEventLoop();
    try {
      store.load(storePath);
      count++;
    } catch (err) {
      log.info(`Error loading item ${storePath}: ${errorMessage(err)}`);
    }
  }
  const seconds = (Date.now() - start) / 1000;
  log.info(`Warmed item cache for ${store.baseDir} (${count} items) in ${seconds.toFixed(2)}s`);
  return count;
}
