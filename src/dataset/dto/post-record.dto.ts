import { IsArray, IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

export class PostRecordDto {
  @IsString()
  @IsNotEmpty()
  authorId!: string;

  @IsString()
  @IsNotEmpty()
  takenAt!: string;

  @IsString()
  captionText!: string;

  @IsArray()
  @IsString({ each: true })
  captionTags!: string[];

  @IsInt({ message: 'like_count must be an integer' })
  @Min(0, { message: 'like_count must not be negative' })
  likeCount!: number;

  @IsInt({ message: 'comment_count must be an integer' })
  @Min(0, { message: 'comment_count must not be negative' })
  commentCount!: number;
}
