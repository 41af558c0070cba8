import type { AnalysisResult, RankedEntry, Summary } from '../../core/types.js';

const formatCount = (count: number): string => count.toLocaleString('en-US');

const formatRanking = <K extends string | number>(entries: readonly RankedEntry<K>[]): string =>
  entries.map((entry) => `${String(entry.key)} (${formatCount(entry.count)})`).join(', ');

const formatBound = (value: string | number | null): string =>
  value === null ? 'n/a' : String(value);

/**
 * Human-readable block for one summary. Lines whose data is empty are left out.
 */
export const renderDatasetSummary = (title: string, summary: Summary): string[] => {
  const lines: string[] = [`=== ${title} ===`];

  lines.push(
    `Total triples: ${formatCount(summary.tripleCount)}` +
      `; unique subjects: ${formatCount(summary.uniqueSubjects)}` +
      `; unique objects: ${formatCount(summary.uniqueObjects)}` +
      `; relations: ${formatCount(summary.uniqueRelations)}`
  );

  if (summary.topEntities.length > 0) {
    lines.push(`Top entities: ${formatRanking(summary.topEntities)}`);
  }
  if (summary.topRelations.length > 0) {
    lines.push(`Top relations: ${formatRanking(summary.topRelations)}`);
  }
  if (summary.topYears.length > 0) {
    lines.push(`Most active years: ${formatRanking(summary.topYears)}`);
  }
  if (summary.topMarkers.length > 0) {
    lines.push(
      `Temporal markers: ${formatRanking(summary.topMarkers)}` +
        `; with explicit temporal info: ${formatCount(summary.temporalRecordCount)}`
    );
  }
  if (summary.minDate !== null || summary.maxDate !== null) {
    lines.push(`Date range: ${formatBound(summary.minDate)} to ${formatBound(summary.maxDate)}`);
  }
  if (summary.minYear !== null || summary.maxYear !== null) {
    lines.push(`Year span: ${formatBound(summary.minYear)} to ${formatBound(summary.maxYear)}`);
  }

  return lines;
};

/**
 * Full console report: each dataset block, then (when requested) its split
 * blocks indented underneath, then a blank separator line.
 */
export const renderAnalysisReport = (result: AnalysisResult, perFile: boolean): string[] => {
  const lines: string[] = [];

  for (const [dataset, report] of result) {
    lines.push(...renderDatasetSummary(dataset, report.aggregate));

    if (perFile) {
      for (const [fileName, summary] of report.files) {
        const [header = '', ...body] = renderDatasetSummary(`${dataset}/${fileName}`, summary);
        lines.push(`  ${header}`);
        lines.push(...body.map((line) => `    ${line}`));
      }
    }

    lines.push('');
  }

  return lines;
};
