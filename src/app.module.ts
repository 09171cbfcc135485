import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import reportConfig, { validateReportEnvironment } from './common/config/report.config';
import { ReportModule } from './report/report.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [reportConfig],
      validate: validateReportEnvironment,
    }),
    ReportModule,
  ],
})
export class AppModule {}
