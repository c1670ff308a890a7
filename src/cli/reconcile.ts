import 'dotenv/config';
import { Command } from 'commander';
import { appendEvent, makeEvent } from '../ledger/ledger';
import { writeRunArtifact } from '../ledger/storage';
import { ReconcileReport, reconcileManifest } from '../manifest/reconciler';
import { StoreLayout, getObjectStore } from '../storage';
import { makeRunId } from '../core/time';
import { loadPipelineConfig } from './context';

const program = new Command();

program
  .option('--apply', 'delete orphaned objects (default is a dry run)', false)
  .option('--verify-checksums', 'download declared objects and compare sha256', false)
  .option('--config <path>', 'pipeline config file');

interface ReconcileCliOptions {
  apply?: boolean;
  verifyChecksums?: boolean;
  config?: string;
}

const printReport = (report: ReconcileReport) => {
  console.log(`Manifest ${report.manifestKey} (generated ${report.manifestGeneratedAt})`);
  console.log(`  scanned ${report.scanned}, declared ${report.desired}, protected ${report.protectedKeys}`);
  console.log(`  ${report.dryRun ? 'would delete' : 'deleted'} ${report.dryRun ? report.toDelete.length : report.deleted.length}`);
  report.retained.forEach((key) => console.log(`  kept undeclared: ${key}`));
  report.missing.forEach((key) => console.log(`  missing: ${key}`));
  report.checksumMismatch.forEach((key) => console.log(`  changed: ${key}`));
  report.failures.forEach((f) => console.log(`  failed: ${f.key} (${f.error})`));
};

const run = async () => {
  const opts = program.parse(process.argv).opts<ReconcileCliOptions>();
  const config = loadPipelineConfig(opts.config);
  const store = getObjectStore();
  const report = await reconcileManifest(store, new StoreLayout(config.storage), {
    apply: Boolean(opts.apply),
    verifyChecksums: Boolean(opts.verifyChecksums)
  });
  const runId = makeRunId(new Date(), 'reconcile');
  const { drift, ...summary } = report;
  appendEvent(
    makeEvent(runId, report.dryRun ? 'RECONCILE_REPORTED' : 'RECONCILE_APPLIED', {
      store: store.name,
      toDelete: report.toDelete.length,
      deleted: report.deleted.length,
      retained: report.retained.length,
      missing: report.missing.length,
      checksumMismatch: report.checksumMismatch.length,
      failures: report.failures.length,
      drift: drift?.message ?? null
    })
  );
  writeRunArtifact(runId, 'reconcile.json', summary);
  printReport(report);
  if (report.failures.length) process.exitCode = 1;
};

if (require.main === module) {
  run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
