import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

export class UserRecordDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsInt({ message: 'ig_num_followers must be an integer' })
  @Min(0, { message: 'ig_num_followers must not be negative' })
  followerCount!: number;
}
