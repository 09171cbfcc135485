#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { EngagementReportService } from './report/services/engagement-report.service';

async function bootstrap() {
  // createApplicationContext starts Nest WITHOUT the HTTP server
  const app = await NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
  });

  try {
    const summary = await app.get(EngagementReportService).generate();
    Logger.log(
      `Report ready: ${summary.outputPath} (${summary.rankedUsers} users, ${summary.postsKept}/${summary.postsLoaded} posts)`,
      'EngagementReport',
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), 'EngagementReport');
  process.exitCode = 1;
});
