import { runBuildLabelMappingCommand } from '../src/app/commands/build-label-mapping.js';
import { runCommand } from '../src/app/runtime.js';

await runCommand(runBuildLabelMappingCommand);
