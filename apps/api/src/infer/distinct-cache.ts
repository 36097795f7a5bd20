import type { Dataset } from '../types/schema';

/**
 * Distinct non-missing values per (dataset, column), computed on first use and kept
 * for the rest of the session. Values are compared by their string form.
 */
export class DistinctValueCache {
  private readonly sets = new Map<string, ReadonlySet<string>>();
  private misses = 0;

  constructor(private readonly datasets: ReadonlyMap<string, Dataset>) {}

  get(dataset: string, column: string): ReadonlySet<string> {
    const key = JSON.stringify([dataset, column]);
    const cached = this.sets.get(key);
    if (cached) return cached;

    this.misses++;
    const table = this.datasets.get(dataset);
    const index = table ? table.columns.indexOf(column) : -1;
    const values = new Set<string>();
    if (table && index >= 0) {
      for (const row of table.rows) {
        const value = row[index];
        if (value !== null) values.add(String(value));
      }
    }
    this.sets.set(key, values);
    return values;
  }

  /** Number of sets materialised so far. */
  get computed() {
    return this.misses;
  }
}
