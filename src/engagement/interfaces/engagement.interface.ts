import { Post, User } from '../../dataset/interfaces/dataset.interface';

/** The literals counted in each caption. */
export interface CountingLiterals {
  mention: string;
  hashtag: string;
}

export interface DerivedPost extends Post {
  mentionCount: number;
  hashtagCount: number;
  commentsWithMention: number; // commentCount when the caption mentions the brand, else 0
  likesWithMention: number;
}

export interface AuthorAggregate {
  authorId: string;
  commentsAll: number;
  commentsWithMentionAll: number;
  likesAll: number;
  likesWithMentionAll: number;
  postsAll: number;
  postMentionsAll: number;
  postHashtagsAll: number;
}

export interface RankedUser extends User, Omit<AuthorAggregate, 'authorId'> {
  engagementGeneral: number;
  engagementSpecific: number;
  score: number;
}
