/**
 * Record counts per country for one run.
 */
export class StatisticsCollector {
  private readonly counts = new Map<string, number>()

  get total(): number {
    let sum = 0
    for (const count of this.counts.values()) sum += count
    return sum
  }

  countries(): string[] {
    return [...this.counts.keys()].sort()
  }

  get(countryCode: string): number {
    return this.counts.get(countryCode) ?? 0
  }

  increment(countryCode: string): void {
    this.counts.set(countryCode, this.get(countryCode) + 1)
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.countries().map((country) => [country, this.get(country)]))
  }
}
