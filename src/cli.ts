import { Command } from 'commander';
import { APP_NAME } from './config/branding.js';
import { registerPullAll } from './commands/pull-all.js';
import { registerFind } from './commands/find.js';
import { registerSync } from './commands/sync.js';
import { registerCloneOrUpdate } from './commands/clone-or-update.js';
import { registerState } from './commands/state.js';
import { registerRepo } from './commands/repo.js';
import { registerConfig } from './commands/config.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Keep fleets of git repositories up to date: bulk pull, org sync and cleanup')
  .version('0.1.0');

registerPullAll(program);
registerFind(program);
registerSync(program);
registerCloneOrUpdate(program);
registerState(program);
registerRepo(program);
registerConfig(program);

await program.parseAsync();
