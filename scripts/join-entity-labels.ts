import { runJoinEntityLabelsCommand } from '../src/app/commands/join-entity-labels.js';
import { runCommand } from '../src/app/runtime.js';

await runCommand(runJoinEntityLabelsCommand);
