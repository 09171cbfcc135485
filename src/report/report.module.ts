import { Module } from '@nestjs/common';
import { DatasetModule } from '../dataset/dataset.module';
import { EngagementModule } from '../engagement/engagement.module';
import { EngagementReportService } from './services/engagement-report.service';
import { PdfConverterService } from './services/pdf-converter.service';
import { PdfMergerService } from './services/pdf-merger.service';
import { ReportRendererService } from './services/report-renderer.service';

@Module({
  imports: [DatasetModule, EngagementModule],
  providers: [
    ReportRendererService,
    PdfConverterService,
    PdfMergerService,
    EngagementReportService,
  ],
  exports: [EngagementReportService],
})
export class ReportModule {}
