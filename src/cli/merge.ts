import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { parseDocument, refinementLayerSchema } from '../core/schema';
import { makeRunId } from '../core/time';
import { readJSONFile } from '../core/utils';
import { appendEvent, makeEvent } from '../ledger/ledger';
import { applyRefinementLayer } from '../recommendation/recommendationStore';
import { StoreLayout, getObjectStore } from '../storage';
import { loadPipelineConfig } from './context';

const program = new Command();

program
  .requiredOption('--layer <file>', 'refinement layer JSON ({ name, selectionDate, entries[] })')
  .option('--config <path>', 'pipeline config file');

interface MergeCliOptions {
  layer: string;
  config?: string;
}

const run = async () => {
  const opts = program.parse(process.argv).opts<MergeCliOptions>();
  const config = loadPipelineConfig(opts.config);
  const file = path.resolve(process.cwd(), opts.layer);
  const layer = parseDocument(refinementLayerSchema, readJSONFile(file), file);
  const set = await applyRefinementLayer(getObjectStore(), new StoreLayout(config.storage), layer, config.actionBands);
  appendEvent(
    makeEvent(makeRunId(new Date(), 'merge'), 'REFINEMENT_MERGED', {
      layer: layer.name,
      selectionDate: set.selectionDate,
      layers: set.layers.map((l) => l.name),
      summary: set.summary
    })
  );
  set.records
    .filter((r) => r.overrideFlag)
    .forEach((r) => console.log(`override: ${r.instrumentId} ${r.baseAction} -> ${r.finalAction}`));
};

if (require.main === module) {
  run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
