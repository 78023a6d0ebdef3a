import { parseEventId } from "@shared/utils";

export type RefreshPhase = "new" | "existing";

export interface RefreshQueueEntry {
  url: string;
  phase: RefreshPhase;
  /** 1-based position in processing order. */
  position: number;
}

/**
 * Processing order for one refresh cycle: every unseen event before any
 * known one, each phase keeping listing order. A cycle that dies midway has
 * still captured what the store did not have yet.
 */
export class RefreshQueue {
  readonly newUrls: readonly string[];
  readonly existingUrls: readonly string[];

  private constructor(newUrls: string[], existingUrls: string[]) {
    this.newUrls = newUrls;
    this.existingUrls = existingUrls;
  }

  static partition(urls: readonly string[], existingIds: ReadonlySet<string>): RefreshQueue {
    const newUrls: string[] = [];
    const existingUrls: string[] = [];
    for (const url of urls) {
      const id = parseEventId(url);
      if (id !== null && existingIds.has(id)) {
        existingUrls.push(url);
      } else {
        newUrls.push(url);
      }
    }
    return new RefreshQueue(newUrls, existingUrls);
  }

  get size() {
    return this.newUrls.length + this.existingUrls.length;
  }

  *entries(): IterableIterator<RefreshQueueEntry> {
    let position = 0;
    for (const url of this.newUrls) {
      position += 1;
      yield { url, phase: "new", position };
    }
    for (const url of this.existingUrls) {
      position += 1;
      yield { url, phase: "existing", position };
    }
  }
}
