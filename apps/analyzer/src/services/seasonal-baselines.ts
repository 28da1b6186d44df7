import { GroupKey, SeasonalStat } from '../interfaces/seasonal-stat.interface';
import { compareGroupKeys, encodeGroupKey } from '../utils/group-key';

/**
 * Mapping from (city, season) to its baseline statistics
 */
export class SeasonalBaselines {
  private readonly stats = new Map<string, SeasonalStat>();

  constructor(stats: Iterable<SeasonalStat> = []) {
    for (const stat of stats) {
      this.stats.set(encodeGroupKey(stat), stat);
    }
  }

  get size(): number {
    return this.stats.size;
  }

  get(key: GroupKey): SeasonalStat | undefined {
    return this.stats.get(encodeGroupKey(key));
  }

  /**
   * All baselines, sorted by city then season
   */
  list(): SeasonalStat[] {
    return [...this.stats.values()].sort(compareGroupKeys);
  }

  forCity(city: string): SeasonalStat[] {
    return this.list().filter((stat) => stat.city === city);
  }
}
