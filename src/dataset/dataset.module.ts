import { Module } from '@nestjs/common';
import { CsvReaderService } from './services/csv-reader.service';
import { DatasetLoaderService } from './services/dataset-loader.service';

@Module({
  providers: [CsvReaderService, DatasetLoaderService],
  exports: [DatasetLoaderService],
})
export class DatasetModule {}
