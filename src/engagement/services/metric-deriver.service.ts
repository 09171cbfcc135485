import { Injectable } from '@nestjs/common';
import { Post } from '../../dataset/interfaces/dataset.interface';
import { countOccurrences } from '../engagement.util';
import { CountingLiterals, DerivedPost } from '../interfaces/engagement.interface';

@Injectable()
export class MetricDeriverService {
  derive(posts: Post[], literals: CountingLiterals): DerivedPost[] {
    return posts.map((post) => this.derivePost(post, literals));
  }

  derivePost(post: Post, { mention, hashtag }: CountingLiterals): DerivedPost {
    const mentionCount = countOccurrences(post.captionText, mention);
    const mentioned = mentionCount !== 0;

    return {
      ...post,
      mentionCount,
      hashtagCount: countOccurrences(post.captionText, hashtag),
      commentsWithMention: mentioned ? post.commentCount : 0,
      likesWithMention: mentioned ? post.likeCount : 0,
    };
  }
}
