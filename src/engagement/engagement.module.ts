import { Module } from '@nestjs/common';
import { MetricDeriverService } from './services/metric-deriver.service';
import { PostAggregatorService } from './services/post-aggregator.service';
import { PostFilterService } from './services/post-filter.service';
import { RankingService } from './services/ranking.service';

@Module({
  providers: [PostFilterService, MetricDeriverService, PostAggregatorService, RankingService],
  exports: [PostFilterService, MetricDeriverService, PostAggregatorService, RankingService],
})
export class EngagementModule {}
