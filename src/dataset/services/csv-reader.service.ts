import { Injectable } from '@nestjs/common';
import csv from 'csv-parser';
import { promises as fs } from 'fs';
import { Readable } from 'stream';
import { ReportError } from '../../common/errors/report.errors';
import { CsvRow, DatasetSource } from '../interfaces/dataset.interface';

const BYTE_ORDER_MARK = /^\uFEFF/;

@Injectable()
export class CsvReaderService {
  async read(source: DatasetSource): Promise<CsvRow[]> {
    const buffer = typeof source === 'string' ? await this.readFile(source) : source;
    return this.parseCsv(buffer);
  }

  private async readFile(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ReportError(`Could not read dataset ${filePath}: ${reason}`, 'load');
    }
  }

  private async parseCsv(buffer: Buffer): Promise<CsvRow[]> {
    const results: CsvRow[] = [];
    const stream = Readable.from(buffer);

    return new Promise((resolve, reject) => {
      stream
        .pipe(
          csv({
            mapHeaders: ({ header }) => header.replace(BYTE_ORDER_MARK, '').trim(),
          }),
        )
        .on('data', (row: CsvRow) => results.push(row))
        .on('end', () => resolve(results))
        .on('error', reject);
    });
  }
}
