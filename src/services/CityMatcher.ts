import { Row } from '../models/Table';
import { CITY_CORRECTIONS, correctCity, normalizeCity } from '../utils/normalize';
export interface CityCorrection {
  requested: string;
  corrected: string;
}
export class CityMatcher {
  private readonly targets: ReadonlySet<string>;
  private readonly corrections: CityCorrection[] = [];
  constructor(cities: string[], corrections: Readonly<Record<string, string>> = CITY_CORRECTIONS) {
    const targets = new Set<string>();
    for (const city of cities) {
      const key = normalizeCity(city);
      const corrected = correctCity(key, corrections);
      if (corrected !== key) {
        this.corrections.push({
          requested: city,
          corrected
        });
      }
      targets.add(corrected);
    }
    this.targets = targets;
  }
  getTargets(): string[] {
    return [...this.targets];
  }

  /** Requested names that were rewritten through the correction table. */
  getCorrections(): CityCorrection[] {
    return [...this.corrections];
  }
  matchesName(name: string): boolean {
    return this.targets.has(normalizeCity(name));
  }

  /**
   * A row without a cell at `regionIdx` is never kept.
   */
  matchesRow(row: Row, regionIdx: number): boolean {
    if (regionIdx < 0 || regionIdx >= row.length) {
      return false;
    }
    return this.matchesName(row[regionIdx]);
  }
}
