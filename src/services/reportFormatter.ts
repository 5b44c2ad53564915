import type { HourSummary, TripAnalysis } from '../types';
import type { HourlyHistogram } from '../utils/hourlyHistogram';

export const summarizeHours = (histogram: HourlyHistogram): HourSummary[] => {
  const summaries: HourSummary[] = [];
  for (const [hour, h] of histogram.entries()) {
    summaries.push({
      hour,
      count: h.totalCount,
      mean: h.mean,
      p50: h.valueAtPercentile(50),
      p90: h.valueAtPercentile(90),
      p99: h.valueAtPercentile(99),
      max: h.max,
    });
  }
  return summaries;
};

const minutes = (seconds: number) => (seconds / 60).toFixed(1);

export const formatReport = ({ counts, histogram }: TripAnalysis): string => {
  const header = `read: ${counts.read}, matched: ${counts.matched}, skipped: ${counts.skipped}`;

  // Hours without trips are left out
  const hourLines = summarizeHours(histogram)
    .filter(s => s.count > 0)
    .map(s =>
      `- ${s.hour.toString().padStart(2, '0')}:00 trips: ${s.count}, mean: ${minutes(s.mean)}m, ` +
      `p50: ${minutes(s.p50)}m, p90: ${minutes(s.p90)}m, p99: ${minutes(s.p99)}m, max: ${minutes(s.max)}m`
    );

  return [header, ...hourLines].join('\n');
};

export const formatReportJson = ({ counts, histogram }: TripAnalysis): string =>
  JSON.stringify({ counts, hours: summarizeHours(histogram) }, null, 2);
