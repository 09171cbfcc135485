import { Test, TestingModule } from '@nestjs/testing';
import { Post } from '../../dataset/interfaces/dataset.interface';
import { MetricDeriverService } from './metric-deriver.service';

const literals = { mention: '@b', hashtag: '#b' };

const post = (captionText: string): Post => ({
  authorId: '1',
  takenAt: new Date('2021-01-15T12:00:00Z'),
  captionText,
  captionTags: [],
  likeCount: 40,
  commentCount: 7,
});

describe('MetricDeriverService', () => {
  let service: MetricDeriverService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricDeriverService],
    }).compile();

    service = module.get<MetricDeriverService>(MetricDeriverService);
  });

  it('counts mentions and hashtags and keeps engagement for mentioning posts', () => {
    const [derived] = service.derive([post('@b and @b again #b')], literals);

    expect(derived).toEqual({
      ...post('@b and @b again #b'),
      mentionCount: 2,
      hashtagCount: 1,
      commentsWithMention: 7,
      likesWithMention: 40,
    });
  });

  it('zeroes mention-gated engagement when the caption has no mention', () => {
    const [derived] = service.derive([post('only a #b here')], literals);

    expect(derived.mentionCount).toBe(0);
    expect(derived.hashtagCount).toBe(1);
    expect(derived.commentsWithMention).toBe(0);
    expect(derived.likesWithMention).toBe(0);
  });

  it('keeps the input order', () => {
    const derived = service.derive([post('first'), post('second @b')], literals);

    expect(derived.map((p) => p.captionText)).toEqual(['first', 'second @b']);
  });
});
