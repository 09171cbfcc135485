import { Injectable, Logger } from '@nestjs/common';
import { ZeroFollowerPolicy } from '../../common/config/report.config';
import { DivisionError } from '../../common/errors/report.errors';
import { User } from '../../dataset/interfaces/dataset.interface';
import { roundHalfEven } from '../engagement.util';
import { AuthorAggregate, RankedUser } from '../interfaces/engagement.interface';

@Injectable()
export class RankingService {
  private readonly logger = new Logger(RankingService.name);

  /**
   * Joins users to their aggregates (users without one are dropped), scores
   * them and sorts by score, highest first. Equal scores keep the users order.
   */
  rank(
    users: User[],
    aggregates: ReadonlyMap<string, AuthorAggregate>,
    zeroFollowerPolicy: ZeroFollowerPolicy = ZeroFollowerPolicy.Error,
  ): RankedUser[] {
    const ranked: RankedUser[] = [];

    for (const user of users) {
      const aggregate = aggregates.get(user.id);
      if (!aggregate) continue;

      if (user.followerCount === 0) {
        if (zeroFollowerPolicy === ZeroFollowerPolicy.Error) {
          throw new DivisionError(
            `User ${user.id} (${user.username}) has zero followers; engagement is undefined`,
            user.id,
          );
        }
        if (zeroFollowerPolicy === ZeroFollowerPolicy.Skip) {
          this.logger.warn(`Skipping user ${user.id} (${user.username}): zero followers`);
          continue;
        }
      }

      ranked.push(this.score(user, aggregate));
    }

    const userIds = new Set(users.map((user) => user.id));
    const unmatched = [...aggregates.keys()].filter((authorId) => !userIds.has(authorId));
    if (unmatched.length > 0) {
      this.logger.warn(`Posts by unknown authors ignored: ${unmatched.join(', ')}`);
    }

    // Array.prototype.sort is stable
    return ranked.sort((a, b) => b.score - a.score);
  }

  score(user: User, aggregate: AuthorAggregate): RankedUser {
    const { authorId: _authorId, ...totals } = aggregate;

    return {
      ...user,
      ...totals,
      engagementGeneral: this.engagementRate(
        aggregate.likesAll + aggregate.commentsAll,
        user.followerCount,
      ),
      engagementSpecific: this.engagementRate(
        aggregate.likesWithMentionAll + aggregate.commentsWithMentionAll,
        user.followerCount,
      ),
      score: aggregate.postsAll + aggregate.postMentionsAll + aggregate.postHashtagsAll,
    };
  }

  /** Interactions per follower as a percentage, two decimals. Zero followers rate as 0. */
  private engagementRate(interactions: number, followers: number): number {
    if (followers === 0) return 0;
    return roundHalfEven((interactions / followers) * 100, 2);
  }
}
