import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ZeroFollowerPolicy } from '../../common/config/report.config';
import { DivisionError } from '../../common/errors/report.errors';
import { Post, User } from '../../dataset/interfaces/dataset.interface';
import { AuthorAggregate } from '../interfaces/engagement.interface';
import { MetricDeriverService } from './metric-deriver.service';
import { PostAggregatorService } from './post-aggregator.service';
import { RankingService } from './ranking.service';

const user = (id: string, followerCount: number): User => ({
  id,
  username: `user${id}`,
  followerCount,
});

const aggregate = (authorId: string, overrides: Partial<AuthorAggregate> = {}): AuthorAggregate => ({
  authorId,
  commentsAll: 0,
  commentsWithMentionAll: 0,
  likesAll: 0,
  likesWithMentionAll: 0,
  postsAll: 1,
  postMentionsAll: 0,
  postHashtagsAll: 0,
  ...overrides,
});

const byId = (...aggregates: AuthorAggregate[]) =>
  new Map(aggregates.map((entry) => [entry.authorId, entry]));

describe('RankingService', () => {
  let service: RankingService;
  let deriver: MetricDeriverService;
  let aggregator: PostAggregatorService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [RankingService, MetricDeriverService, PostAggregatorService],
    }).compile();

    service = module.get<RankingService>(RankingService);
    deriver = module.get<MetricDeriverService>(MetricDeriverService);
    aggregator = module.get<PostAggregatorService>(PostAggregatorService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('scores and orders users from their posts', () => {
    const post = (authorId: string, captionText: string): Post => ({
      authorId,
      takenAt: new Date('2021-01-10T00:00:00Z'),
      captionText,
      captionTags: [],
      likeCount: 10,
      commentCount: 5,
    });
    const posts = deriver.derive(
      [post('1', 'hello @b'), post('1', 'again @b'), post('2', 'no brand here')],
      { mention: '@b', hashtag: '#b' },
    );

    const ranked = service.rank([user('1', 100), user('2', 50)], aggregator.aggregate(posts));

    expect(ranked.map((entry) => entry.id)).toEqual(['1', '2']);
    expect(ranked[0]).toMatchObject({
      postsAll: 2,
      postMentionsAll: 2,
      likesWithMentionAll: 20,
      engagementGeneral: 30,
      engagementSpecific: 30,
      score: 4,
    });
    expect(ranked[1]).toMatchObject({
      postsAll: 1,
      postMentionsAll: 0,
      engagementGeneral: 30,
      engagementSpecific: 0,
      score: 1,
    });
  });

  it('sorts by score, highest first', () => {
    const ranked = service.rank(
      [user('5', 10), user('9', 10), user('2', 10)],
      byId(
        aggregate('5', { postsAll: 5 }),
        aggregate('9', { postsAll: 3, postMentionsAll: 4, postHashtagsAll: 2 }),
        aggregate('2', { postsAll: 2 }),
      ),
    );

    expect(ranked.map((entry) => entry.score)).toEqual([9, 5, 2]);
    expect(ranked.map((entry) => entry.id)).toEqual(['9', '5', '2']);
  });

  it('keeps the users order for equal scores', () => {
    const ranked = service.rank(
      [user('c', 10), user('a', 10), user('b', 10)],
      byId(aggregate('a'), aggregate('b'), aggregate('c')),
    );

    expect(ranked.map((entry) => entry.id)).toEqual(['c', 'a', 'b']);
  });

  it('only ranks users that have an aggregate and aggregates that have a user', () => {
    const ranked = service.rank(
      [user('1', 10), user('2', 10)],
      byId(aggregate('2'), aggregate('orphan')),
    );

    expect(ranked.map((entry) => entry.id)).toEqual(['2']);
  });

  it('warns about authors without a user row', () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    service.rank([user('1', 10)], byId(aggregate('1'), aggregate('8'), aggregate('9')));

    expect(warn).toHaveBeenCalledWith('Posts by unknown authors ignored: 8, 9');
    warn.mockRestore();
  });

  it('rounds engagement to two decimals', () => {
    const [ranked] = service.rank([user('1', 3)], byId(aggregate('1', { likesAll: 1 })));

    expect(ranked.engagementGeneral).toBe(33.33);
  });

  describe('zero followers', () => {
    const users = [user('1', 0), user('2', 10)];
    const aggregates = byId(aggregate('1', { likesAll: 4 }), aggregate('2', { likesAll: 1 }));

    it('fails by default', () => {
      expect(() => service.rank(users, aggregates)).toThrow(DivisionError);
      expect(() => service.rank(users, aggregates)).toThrow(
        'User 1 (user1) has zero followers; engagement is undefined',
      );
    });

    it('drops the user when skipping', () => {
      const ranked = service.rank(users, aggregates, ZeroFollowerPolicy.Skip);

      expect(ranked.map((entry) => entry.id)).toEqual(['2']);
    });

    it('reports zero engagement when asked to', () => {
      const ranked = service.rank(users, aggregates, ZeroFollowerPolicy.Zero);

      expect(ranked.map((entry) => entry.id)).toEqual(['1', '2']);
      expect(ranked[0].engagementGeneral).toBe(0);
      expect(ranked[0].engagementSpecific).toBe(0);
    });

    it('ignores zero-follower users without posts', () => {
      expect(service.rank([user('3', 0)], aggregates)).toEqual([]);
    });
  });
});
