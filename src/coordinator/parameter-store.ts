/**
 * Parameter Store
 *
 * The merged snapshot. Each key remembers which source wrote it and when;
 * the newest write wins. Writes are ordered by a revision the store hands
 * out, not by wall time, so a clock step cannot reorder them. A write whose
 * revision is older than the key's current entry is ignored: a fallback
 * round reserves its revision when it starts, and cannot overwrite a value
 * the live connection delivered while that round was in flight.
 */

import { DataSource } from '../health/types';
import { ParameterSnapshot } from '../protocol/parameter-codec';

/** Position of a write in the store's order, plus its wall-clock time */
export interface WriteStamp {
  revision: number;
  at: number;
}

export interface ParameterEntry {
  value: string;
  source: DataSource;
  /** Wall-clock time of the write, for diagnostics only */
  updatedAt: number;
  revision: number;
}

export interface ParameterChange {
  key: string;
  value: string;
  previous: string | undefined;
  source: DataSource;
}

export class ParameterStore {
  private entries = new Map<string, ParameterEntry>();
  private revision = 0;

  get size(): number {
    return this.entries.size;
  }

  get(key: string): string | undefined {
    return this.entries.get(key)?.value;
  }

  getEntry(key: string): ParameterEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  snapshot(): ParameterSnapshot {
    const result: ParameterSnapshot = {};
    for (const [key, entry] of this.entries) {
      result[key] = entry.value;
    }
    return result;
  }

  /** Reserve the next revision; any stamp taken later wins over this one */
  stamp(at: number): WriteStamp {
    this.revision++;
    return { revision: this.revision, at };
  }

  /**
   * Apply values written at `stamp`. Returns only the keys whose value
   * actually changed; re-applying an identical value refreshes its
   * entry but reports nothing.
   */
  apply(values: ParameterSnapshot, source: DataSource, stamp: WriteStamp): ParameterChange[] {
    const changes: ParameterChange[] = [];

    for (const [key, value] of Object.entries(values)) {
      const current = this.entries.get(key);
      if (current && current.revision > stamp.revision) continue;

      this.entries.set(key, { value, source, updatedAt: stamp.at, revision: stamp.revision });
      if (current?.value !== value) {
        changes.push({ key, value, previous: current?.value, source });
      }
    }

    return changes;
  }
}
