const byKey = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** month ("YYYY-MM") → sum in minor units. Absent months read as zero. */
export class MonthlyTotals {
  private readonly totals = new Map<string, number>();

  add(month: string, minor: number): void {
    this.totals.set(month, this.get(month) + minor);
  }

  get(month: string): number {
    return this.totals.get(month) ?? 0;
  }

  /** Months in chronological order. */
  months(): string[] {
    return Array.from(this.totals.keys()).sort(byKey);
  }

  total(): number {
    let sum = 0;
    for (const value of this.totals.values()) {
      sum += value;
    }
    return sum;
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.months().map((month) => [month, this.get(month)] as const));
  }
}

/** month → label → sum in minor units. Absent keys at either level read as zero. */
export class MonthlyBreakdown {
  private readonly buckets = new Map<string, Map<string, number>>();

  add(month: string, label: string, minor: number): void {
    let labels = this.buckets.get(month);

    if (!labels) {
      labels = new Map();
      this.buckets.set(month, labels);
    }

    labels.set(label, (labels.get(label) ?? 0) + minor);
  }

  get(month: string, label: string): number {
    return this.buckets.get(month)?.get(label) ?? 0;
  }

  months(): string[] {
    return Array.from(this.buckets.keys()).sort(byKey);
  }

  /** Labels seen in `month`, alphabetical. */
  labels(month: string): string[] {
    return Array.from(this.buckets.get(month)?.keys() ?? []).sort(byKey);
  }

  toRecord(): Record<string, Record<string, number>> {
    return Object.fromEntries(
      this.months().map((month) => [
        month,
        Object.fromEntries(this.labels(month).map((label) => [label, this.get(month, label)] as const)),
      ] as const),
    );
  }
}
