export {
  buildYearlySeries,
  toYearlyPoints,
  type BuildYearlySeriesDeps,
} from './core/usecases/build-yearly-series.js';
export {
  renderBarChartSvg,
  niceTickStep,
  escapeXml,
  type BarChartOptions,
} from './shell/svg-bar-chart.js';
export { writeYearlyChart, chartFileName } from './shell/chart-writer.js';
export type { YearlySeries, YearlyCountPoint, BuildYearlySeriesInput } from './core/types.js';
