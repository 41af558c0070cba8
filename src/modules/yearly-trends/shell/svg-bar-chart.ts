import type { YearlyCountPoint } from '../core/types.js';

export interface BarChartOptions {
  title: string;
  xLabel: string;
  yLabel: string;
  width?: number;
  height?: number;
}

const MARGIN = { top: 40, right: 20, bottom: 50, left: 70 } as const;
const BAR_WIDTH_RATIO = 0.8;
const TARGET_Y_TICKS = 5;
const MAX_X_LABELS = 15;

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export const escapeXml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => XML_ENTITIES[char] ?? char);

const fmt = (value: number): string => value.toFixed(1);

/**
 * Tick spacing of 1, 2 or 5 times a power of ten, never below 1.
 */
export const niceTickStep = (maxValue: number, targetTicks = TARGET_Y_TICKS): number => {
  if (maxValue <= 0) return 1;

  const raw = maxValue / targetTicks;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  const normalized = raw / magnitude;

  let step: number;
  if (normalized <= 1) step = 1;
  else if (normalized <= 2) step = 2;
  else if (normalized <= 5) step = 5;
  else step = 10;

  return Math.max(1, step * magnitude);
};

/**
 * Renders yearly counts as a standalone SVG bar chart. The x axis spans one
 * year beyond each end of the data; horizontal dashed grid lines mark the
 * y ticks. Returns null for an empty series.
 */
export const renderBarChartSvg = (
  points: readonly YearlyCountPoint[],
  options: BarChartOptions
): string | null => {
  const first = points[0];
  const last = points[points.length - 1];
  if (first === undefined || last === undefined) {
    return null;
  }

  const width = options.width ?? 1000;
  const height = options.height ?? 500;
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const plotBottom = MARGIN.top + plotHeight;

  const minYear = Math.min(first.year, last.year) - 1;
  const maxYear = Math.max(first.year, last.year) + 1;
  const yearSpan = maxYear - minYear;
  const maxCount = Math.max(...points.map((point) => point.count));

  const yStep = niceTickStep(maxCount);
  const yMax = Math.max(yStep, Math.ceil(maxCount / yStep) * yStep);

  const xFor = (year: number): number => MARGIN.left + ((year - minYear) / yearSpan) * plotWidth;
  const yFor = (count: number): number => plotBottom - (count / yMax) * plotHeight;
  const barWidth = (plotWidth / yearSpan) * BAR_WIDTH_RATIO;

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${String(width)}" height="${String(height)}" viewBox="0 0 ${String(width)} ${String(height)}" font-family="sans-serif" font-size="12">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<text x="${fmt(width / 2)}" y="24" text-anchor="middle" font-size="16">${escapeXml(options.title)}</text>`,
  ];

  for (let tick = 0; tick <= yMax; tick += yStep) {
    const y = fmt(yFor(tick));
    parts.push(
      `<line x1="${String(MARGIN.left)}" y1="${y}" x2="${String(MARGIN.left + plotWidth)}" y2="${y}" stroke="#999999" stroke-opacity="0.4" stroke-dasharray="4 4"/>`,
      `<text x="${String(MARGIN.left - 6)}" y="${y}" text-anchor="end" dominant-baseline="middle">${tick.toLocaleString('en-US')}</text>`
    );
  }

  for (const point of points) {
    const top = yFor(point.count);
    parts.push(
      `<rect x="${fmt(xFor(point.year) - barWidth / 2)}" y="${fmt(top)}" width="${fmt(barWidth)}" height="${fmt(plotBottom - top)}" fill="#1f77b4"><title>${String(point.year)}: ${point.count.toLocaleString('en-US')}</title></rect>`
    );
  }

  const labelEvery = Math.max(1, Math.ceil((last.year - first.year + 1) / MAX_X_LABELS));
  for (let year = first.year; year <= last.year; year += labelEvery) {
    parts.push(
      `<text x="${fmt(xFor(year))}" y="${String(plotBottom + 16)}" text-anchor="middle">${String(year)}</text>`
    );
  }

  parts.push(
    `<line x1="${String(MARGIN.left)}" y1="${String(plotBottom)}" x2="${String(MARGIN.left + plotWidth)}" y2="${String(plotBottom)}" stroke="#000000"/>`,
    `<line x1="${String(MARGIN.left)}" y1="${String(MARGIN.top)}" x2="${String(MARGIN.left)}" y2="${String(plotBottom)}" stroke="#000000"/>`,
    `<text x="${fmt(MARGIN.left + plotWidth / 2)}" y="${String(height - 10)}" text-anchor="middle">${escapeXml(options.xLabel)}</text>`,
    `<text x="16" y="${fmt(MARGIN.top + plotHeight / 2)}" text-anchor="middle" transform="rotate(-90 16 ${fmt(MARGIN.top + plotHeight / 2)})">${escapeXml(options.yLabel)}</text>`,
    '</svg>'
  );

  return `${parts.join('\n')}\n`;
};
