/**
 * Total Experience
 *
 * Months covered by the union of resolved experience ranges, each range
 * counted inclusively. PRESENT resolves to the record's `asOf` month.
 */

import { monthNumber } from '../extractors/normalize';
import type { DateValue, ExperienceEntry, TotalExperience } from '../types';

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

export function formatDuration(totalMonths: number): string {
  const years = Math.floor(totalMonths / 12);
  const months = totalMonths % 12;
  return years > 0 ? `${plural(years, 'year')} ${plural(months, 'month')}` : plural(months, 'month');
}

export function calculateTotalExperience(
  entries: readonly ExperienceEntry[],
  asOf: DateValue | null
): TotalExperience | null {
  const ranges: Array<[number, number]> = [];

  for (const entry of entries) {
    if (entry.start.value === null) {
      continue;
    }
    const start = monthNumber(entry.start.value, asOf);
    if (start === null) {
      continue;
    }
    const end = entry.end.value === null ? start : monthNumber(entry.end.value, asOf) ?? start;
    if (end >= start) {
      ranges.push([start, end]);
    }
  }

  if (ranges.length === 0) {
    return null;
  }

  ranges.sort((a, b) => a[0] - b[0] || a[1] - b[1]);

  let totalMonths = 0;
  let [currentStart, currentEnd] = ranges[0];
  for (const [start, end] of ranges.slice(1)) {
    if (start <= currentEnd + 1) {
      currentEnd = Math.max(currentEnd, end);
    } else {
      totalMonths += currentEnd - currentStart + 1;
      currentStart = start;
      currentEnd = end;
    }
  }
  totalMonths += currentEnd - currentStart + 1;

  return {
    totalMonths,
    years: Math.floor(totalMonths / 12),
    remainingMonths: totalMonths % 12,
    formatted: formatDuration(totalMonths)
  };
}
