import 'dotenv/config';
import { Command } from 'commander';
import { verifyBackup } from '../archive/backupVerifier';
import { SelectionSlot } from '../archive/selectionSlot';
import { StoreLayout, getObjectStore } from '../storage';
import { loadPipelineConfig } from './context';

const program = new Command();

program
  .option('--date <YYYY-MM-DD>', 'selection date to check (defaults to the current selection artifact)')
  .option('--config <path>', 'pipeline config file');

interface VerifyCliOptions {
  date?: string;
  config?: string;
}

const run = async () => {
  const opts = program.parse(process.argv).opts<VerifyCliOptions>();
  const config = loadPipelineConfig(opts.config);
  const store = getObjectStore();
  const layout = new StoreLayout(config.storage);
  const date = opts.date ?? (await new SelectionSlot(store, layout).read())?.selectionDate ?? null;
  const clearance = await verifyBackup(store, layout, date);
  console.log(JSON.stringify(clearance, null, 2));
  if (!clearance.granted) {
    console.error(`Backup for ${date ?? 'current selection'} is NOT verified: ${clearance.reason ?? 'denied'}`);
    process.exitCode = 1;
  }
};

if (require.main === module) {
  run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
