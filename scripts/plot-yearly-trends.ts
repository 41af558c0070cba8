import { runPlotYearlyTrendsCommand } from '../src/app/commands/plot-yearly-trends.js';
import { runCommand } from '../src/app/runtime.js';

await runCommand(runPlotYearlyTrendsCommand);
