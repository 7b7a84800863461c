import { Logger } from '@nestjs/common';
import FitParser from 'fit-file-parser';
import type { RawFitActivity, RawRow } from '@trackfuse/track';
import { FitDecoder } from './fit-decoder.interface';
import { splitRecordTables } from './record-tables';

export class FitDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FitDecodeError';
  }
}

const CATALOGUE = ['sessions', 'laps', 'events', 'device_infos', 'file_ids', 'activity'] as const;

function isRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowsOf(value: unknown): RawRow[] {
  return Array.isArray(value) ? value.filter(isRow) : [];
}

export class FitFileDecoder implements FitDecoder {
  private readonly logger = new Logger(FitFileDecoder.name);

  async decode(content: Buffer): Promise<RawFitActivity> {
    if (!content || content.length === 0) {
      throw new FitDecodeError('FIT content is empty');
    }

    const parser = new FitParser({
      force: true,
      speedUnit: 'm/s',
      lengthUnit: 'm',
      temperatureUnit: 'celsius',
      elapsedRecordField: true,
      mode: 'list',
    });

    const data = await new Promise<unknown>((resolve, reject) => {
      parser.parse(content, (error: unknown, parsed: unknown) => {
        if (error) {
          reject(new FitDecodeError(`Failed to decode FIT: ${error instanceof Error ? error.message : String(error)}`));
          return;
        }
        resolve(parsed);
      });
    });

    if (!isRow(data)) {
      throw new FitDecodeError('Failed to decode FIT: decoder returned no data');
    }

    const records = splitRecordTables(rowsOf(data.records));
    const activity: RawFitActivity = { records, messageTypes: Object.keys(data).filter((key) => Array.isArray(data[key])) };
    for (const name of CATALOGUE) {
      const value = data[name];
      if (Array.isArray(value)) {
        activity[name] = rowsOf(value);
      } else if (isRow(value)) {
        activity[name] = value;
      }
    }

    if (records.length === 0) {
      this.logger.warn('FIT file contains no record messages');
    } else {
      this.logger.debug(`Decoded ${records.length} record tables`);
    }
    return activity;
  }
}
