import { runAnalyzeCommand } from '../src/app/commands/analyze-temporal-kgs.js';
import { runCommand } from '../src/app/runtime.js';

await runCommand(runAnalyzeCommand);
