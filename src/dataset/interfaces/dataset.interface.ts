export type CsvRow = Record<string, string | undefined>;

/** A file path read from disk, or CSV content already in memory. */
export type DatasetSource = string | Buffer;

export interface User {
  id: string;
  username: string;
  followerCount: number;
}

export interface Post {
  authorId: string;
  takenAt: Date;
  captionText: string;
  captionTags: string[];
  likeCount: number;
  commentCount: number;
}

export const USER_COLUMNS = {
  id: 'id',
  username: 'ig_username',
  followerCount: 'ig_num_followers',
} as const;

export const POST_COLUMNS = {
  authorId: 'person_id',
  takenAt: 'taken_at',
  captionText: 'caption_text',
  captionTags: 'caption_tags',
  likeCount: 'like_count',
  commentCount: 'comment_count',
} as const;
