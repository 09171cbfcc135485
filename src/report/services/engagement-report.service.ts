import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ReportConfig } from '../../common/config/report.config';
import { toIsoDate } from '../../common/utility/date.utils';
import { DatasetLoaderService } from '../../dataset/services/dataset-loader.service';
import { RankedUser } from '../../engagement/interfaces/engagement.interface';
import { MetricDeriverService } from '../../engagement/services/metric-deriver.service';
import { PostAggregatorService } from '../../engagement/services/post-aggregator.service';
import { PostFilterService } from '../../engagement/services/post-filter.service';
import { RankingService } from '../../engagement/services/ranking.service';
import { ReportSummary } from '../interfaces/report.interface';
import { BODY_LAYOUT, TITLE_PAGE_LAYOUT } from '../report.layouts';
import { PdfConverterService } from './pdf-converter.service';
import { PdfMergerService } from './pdf-merger.service';
import { ReportRendererService } from './report-renderer.service';

interface RenderedDocument {
  pdf: Buffer;
  htmlPaths: string[];
}

@Injectable()
export class EngagementReportService {
  private readonly logger = new Logger(EngagementReportService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly loader: DatasetLoaderService,
    private readonly postFilter: PostFilterService,
    private readonly deriver: MetricDeriverService,
    private readonly aggregator: PostAggregatorService,
    private readonly ranking: RankingService,
    private readonly renderer: ReportRendererService,
    private readonly converter: PdfConverterService,
    private readonly merger: PdfMergerService,
  ) {}

  /**
   * Runs the whole pipeline once. The output PDF is only written after every
   * stage succeeded.
   */
  async generate(overrides: Partial<ReportConfig> = {}): Promise<ReportSummary> {
    const config: ReportConfig = {
      ...this.configService.getOrThrow<ReportConfig>('report'),
      ...overrides,
    };

    const users = await this.loader.loadUsers(config.usersFile);
    const posts = await this.loader.loadPosts(config.postsFile);

    const inWindow = this.postFilter.filterByDate(posts, config.startDate, config.endDate);
    this.logger.log(
      `Date window ${config.startDate}..${config.endDate}: ${inWindow.length}/${posts.length} posts`,
    );

    const tagged = this.postFilter.filterByTags(inWindow, config.brandTags);
    this.logger.log(`Brand tags [${config.brandTags.join(', ')}]: ${tagged.length} posts`);

    const derived = this.deriver.derive(tagged, {
      mention: config.mention,
      hashtag: config.hashtag,
    });
    const aggregates = this.aggregator.aggregate(derived);
    const ranked = this.ranking.rank(users, aggregates, config.zeroFollowerPolicy);
    this.logger.log(`Ranked ${ranked.length} of ${users.length} users (${aggregates.size} active authors)`);

    const { pdf, htmlPaths } = await this.renderDocument(ranked, config);

    await fs.writeFile(config.outputFile, pdf);
    this.logger.log(`Wrote ${config.outputFile}`);

    return {
      outputPath: config.outputFile,
      htmlPaths,
      usersLoaded: users.length,
      postsLoaded: posts.length,
      postsKept: tagged.length,
      rankedUsers: ranked.length,
    };
  }

  private async renderDocument(ranked: RankedUser[], config: ReportConfig): Promise<RenderedDocument> {
    const outputDir = path.dirname(path.resolve(config.outputFile));
    await fs.mkdir(outputDir, { recursive: true });

    const generatedAt = toIsoDate(new Date());
    const context = {
      title: config.title,
      startDate: config.startDate,
      endDate: config.endDate,
      brandTags: config.brandTags,
      generatedAt,
      rows: ranked,
    };
    const renderOptions = { templatesDir: config.templatesDir };

    const titleHtml = await this.renderer.render('title-page', context, renderOptions);
    const bodyHtml = await this.renderer.render('report', context, renderOptions);

    const htmlPaths = [path.join(outputDir, 'title-page.html'), path.join(outputDir, 'report.html')];
    await fs.writeFile(htmlPaths[0], titleHtml, 'utf8');
    await fs.writeFile(htmlPaths[1], bodyHtml, 'utf8');

    const titlePdf = await this.converter.convert(titleHtml, {
      ...TITLE_PAGE_LAYOUT,
      title: config.title,
    });
    const bodyPdf = await this.converter.convert(bodyHtml, {
      ...BODY_LAYOUT,
      title: config.title,
      date: generatedAt,
    });

    return {
      pdf: await this.merger.merge([titlePdf, bodyPdf]),
      htmlPaths,
    };
  }
}
