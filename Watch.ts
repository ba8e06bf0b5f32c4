// Watch.ts
// ========
// Debounced change detection and strictly sequential cycles.

import type { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, logError } from './Log';

export const DEBOUNCE_MS = 500;

/**
 * Runs a task so that at most one instance is active. Triggers that arrive
 * while it runs collapse into a single follow-up run.
 */
export class SerialTrigger {
  private readonly task: () => Promise<void>;
  private readonly onError: (err: unknown) => void;
  private running: Promise<void> | null = null;
  private dirty = false;

  constructor(task: () => Promise<void>, onError: (err: unknown) => void) {
    this.task = task;
    this.onError = onError;
  }

  trigger(): void {
    if (this.running) {
      this.dirty = true;
      return;
    }
    this.running = this.loop().finally(() => {
      this.running = null;
    });
  }

  // Resolves once no run is active or pending
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  private async loop(): Promise<void> {
    do {
      this.dirty = false;
      try {
        await this.task();
      } catch (err) {
        this.onError(err);
      }
    } while (this.dirty);
  }
}

export interface DocumentWatcher {
  close(): void;
}

// Routes watcher errors to `onError` instead of letting them end the process
export function reportWatchErrors(
  watcher: EventEmitter,
  onError: (err: unknown) => void = err => logError(`Watcher error: ${errorMessage(err)}`),
): void {
  watcher.on('error', onError);
}

/**
 * Calls `onChange` once a burst of changes to `file` has settled. The
 * parent directory is watched so editors that save by rename are seen.
 */
export function watchDocument(
  file: string,
  onChange: () => void,
  debounceMs: number = DEBOUNCE_MS,
): DocumentWatcher {
  const name = path.basename(file);
  let timer: NodeJS.Timeout | null = null;

  const watcher = fs.watch(path.dirname(file), (_event, filename) => {
    if (filename !== null && filename.toString() !== name) return;
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      onChange();
    }, debounceMs);
  });
  reportWatchErrors(watcher);

  return {
    close() {
      if (timer) clearTimeout(timer);
      watcher.close();
    },
  };
}
