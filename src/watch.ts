import { existsSync, statSync, watch, type FSWatcher } from "fs";

export interface RebuildQueue {
  /** Rebuild after the debounce window; repeated calls within it collapse into one build */
  schedule(): void;
  /** Rebuild now, or once more after the build in progress */
  trigger(): void;
  /** Resolves when no build is running or queued */
  idle(): Promise<void>;
  close(): void;
}

/**
 * Serialises rebuilds: a change during a build queues exactly one more full
 * build. Errors are logged so the loop keeps running.
 */
export function createRebuildQueue(rebuild: () => Promise<void>, debounceMs = 100): RebuildQueue {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let building = false;
  let pending = false;
  let closed = false;
  let current: Promise<void> = Promise.resolve();

  async function runOnce(): Promise<void> {
    try {
      await rebuild();
    } catch (err) {
      console.error("Rebuild error:", err);
    }
  }

  function trigger(): void {
    if (closed) return;
    if (building) {
      pending = true;
      return;
    }

    building = true;
    current = (async () => {
      try {
        do {
          pending = false;
          await runOnce();
        } while (pending && !closed);
      } finally {
        building = false;
      }
    })();
  }

  return {
    schedule() {
      if (closed) return;
      if (timer) clearTimeout(timer);
      timer = setTimeout(() => {
        timer = undefined;
        trigger();
      }, debounceMs);
    },
    trigger,
    idle() {
      return current;
    },
    close() {
      closed = true;
      if (timer) clearTimeout(timer);
    },
  };
}

export interface WatchOptions {
  /** Runs one full build and returns the files and directories to watch afterwards */
  rebuild: () => Promise<string[]>;
  debounceMs?: number;
}

export interface WatchHandle {
  close(): void;
  idle(): Promise<void>;
}

/** Build once, then rebuild the whole site whenever a watched path changes. */
export async function startWatch(opts: WatchOptions): Promise<WatchHandle> {
  const watchers: FSWatcher[] = [];

  function closeWatchers(): void {
    while (watchers.length > 0) {
      watchers.pop()?.close();
    }
  }

  // Re-armed after every build: a file replaced by rename leaves its old watcher on the deleted inode.
  function syncWatchers(paths: string[]): void {
    closeWatchers();
    for (const path of paths.filter((candidate) => existsSync(candidate))) {
      const recursive = statSync(path).isDirectory();
      const watcher = watch(path, { recursive }, (_event, filename) => {
        console.log("Change detected:", filename ?? path);
        queue.schedule();
      });
      watcher.on("error", (err) => {
        console.error(`Watcher error on ${path}:`, err);
        watcher.close();
      });
      watchers.push(watcher);
    }
  }

  const queue = createRebuildQueue(async () => {
    syncWatchers(await opts.rebuild());
  }, opts.debounceMs);

  queue.trigger();
  await queue.idle();

  return {
    close() {
      queue.close();
      closeWatchers();
    },
    idle: () => queue.idle(),
  };
}
