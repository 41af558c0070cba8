import { runSampleTailCommand } from '../src/app/commands/sample-tail-entities.js';
import { runCommand } from '../src/app/runtime.js';

await runCommand(runSampleTailCommand);
