import { Injectable } from '@nestjs/common';
import { AuthorAggregate, DerivedPost } from '../interfaces/engagement.interface';

@Injectable()
export class PostAggregatorService {
  /**
   * Sums post metrics per author. Only authors with at least one post get an entry.
   */
  aggregate(posts: DerivedPost[]): Map<string, AuthorAggregate> {
    const byAuthor = new Map<string, AuthorAggregate>();

    for (const post of posts) {
      const totals = byAuthor.get(post.authorId) ?? this.emptyAggregate(post.authorId);

      totals.commentsAll += post.commentCount;
      totals.commentsWithMentionAll += post.commentsWithMention;
      totals.likesAll += post.likeCount;
      totals.likesWithMentionAll += post.likesWithMention;
      totals.postsAll += 1;
      totals.postMentionsAll += post.mentionCount;
      totals.postHashtagsAll += post.hashtagCount;

      byAuthor.set(post.authorId, totals);
    }

    return byAuthor;
  }

  private emptyAggregate(authorId: string): AuthorAggregate {
    return {
      authorId,
      commentsAll: 0,
      commentsWithMentionAll: 0,
      likesAll: 0,
      likesWithMentionAll: 0,
      postsAll: 0,
      postMentionsAll: 0,
      postHashtagsAll: 0,
    };
  }
}
