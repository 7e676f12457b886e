/**
 * In-memory directory watcher for testing
 */

import { EventEmitter } from "node:events";
import type { DirectoryWatcher } from "../../watcher/watcher";

export class FakeWatcher extends EventEmitter implements DirectoryWatcher {
  closed = 0;

  async close() {
    this.closed++;
  }
}
