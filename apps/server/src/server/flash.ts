/**
 * @fileoverview Temporary session store
 *
 * Validation errors flashed by a form handler live until the next request of
 * the same session reads them. A forced refresh puts them back, so the
 * reloaded page still shows them.
 */

import type { JsonObject, TemporarySession } from "@inertia-node/core";
import { TTLCache } from "./cache.js";

// Unread flash data expires after 5 minutes
const FLASH_TTL_MS = 5 * 60_000;

export class FlashStore {
  private cache: TTLCache<TemporarySession>;

  constructor(ttlMs = FLASH_TTL_MS) {
    this.cache = new TTLCache<TemporarySession>(ttlMs);
  }

  flashErrors(sessionId: string, errors: JsonObject, prevReqUrl: string): void {
    this.cache.set(sessionId, { errors, prevReqUrl });
  }

  put(sessionId: string, session: TemporarySession): void {
    this.cache.set(sessionId, session);
  }

  /** Returns the flashed session once, then forgets it */
  take(sessionId: string): TemporarySession | null {
    return this.cache.take(sessionId);
  }

  destroy(): void {
    this.cache.destroy();
  }
}
