import { z } from 'zod';
import { InstrumentMeta, instrumentMetaSchema, parseDocument } from '../core/schema';
import { readJSONFile } from '../core/utils';
import { InstrumentMetadataProvider } from './marketData.types';

const universeFileSchema = z.object({ instruments: z.array(instrumentMetaSchema) });

/** Serves the instrument universe from the JSON file named in config. */
export class StaticInstrumentMetadataProvider implements InstrumentMetadataProvider {
  readonly name = 'static';
  private file: string;

  constructor(file: string) {
    this.file = file;
  }

  async fetchInstruments(): Promise<InstrumentMeta[]> {
    return parseDocument(universeFileSchema, readJSONFile(this.file), this.file).instruments;
  }
}
