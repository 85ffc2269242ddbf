/**
 * Fare statistics for one distinct pickup timestamp. Fare figures are null
 * when none of the group's fares is numeric.
 */
export interface DailyKpi {
  readonly pickup_datetime: string;
  readonly total_fare: number;
  readonly count_trips: number;
  readonly average_fare: number | null;
  readonly max_fare: number | null;
  readonly min_fare: number | null;
}
