import { registerAs } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  validateSync,
} from 'class-validator';
import * as path from 'path';
import { ReportError } from '../errors/report.errors';

export enum ZeroFollowerPolicy {
  Error = 'error',
  Skip = 'skip',
  Zero = 'zero',
}

export interface ReportConfig {
  usersFile: string;
  postsFile: string;
  outputFile: string;
  startDate: string;
  endDate: string;
  brandTags: string[];
  mention: string;
  hashtag: string;
  title: string;
  zeroFollowerPolicy: ZeroFollowerPolicy;
  templatesDir: string;
}

// src/common/config and dist/common/config sit at the same depth
export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '..', '..', '..', 'templates');

export const REPORT_DEFAULTS = {
  usersFile: './data/users.csv',
  postsFile: './data/user_posts.csv',
  outputFile: './report.pdf',
  startDate: '2021-01-01',
  endDate: '2021-02-01',
  brandTags: '@bubbleroom,#bubbleroom,#bubbleroomstyle',
  mention: '@bubbleroom',
  hashtag: '#bubbleroom',
  title: 'Brand Engagement Report',
} as const;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class ReportEnvironment {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  REPORT_USERS_FILE?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  REPORT_POSTS_FILE?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  REPORT_OUTPUT_FILE?: string;

  @IsOptional()
  @Matches(DATE_PATTERN, { message: 'REPORT_START_DATE must be a YYYY-MM-DD date' })
  REPORT_START_DATE?: string;

  @IsOptional()
  @Matches(DATE_PATTERN, { message: 'REPORT_END_DATE must be a YYYY-MM-DD date' })
  REPORT_END_DATE?: string;

  @IsOptional()
  @IsString()
  REPORT_BRAND_TAGS?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  REPORT_MENTION?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  REPORT_HASHTAG?: string;

  @IsOptional()
  @IsString()
  REPORT_TITLE?: string;

  @IsOptional()
  @IsEnum(ZeroFollowerPolicy)
  REPORT_ZERO_FOLLOWER_POLICY?: ZeroFollowerPolicy;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  REPORT_TEMPLATES_DIR?: string;
}

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Fails boot with every broken key listed.
 */
export function validateReportEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const environment = plainToInstance(ReportEnvironment, config);
  const errors = validateSync(environment);

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new ReportError(`Invalid configuration: ${details}`, 'config');
  }

  return config;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export default registerAs(
  'report',
  (): ReportConfig => ({
    usersFile: process.env.REPORT_USERS_FILE ?? REPORT_DEFAULTS.usersFile,
    postsFile: process.env.REPORT_POSTS_FILE ?? REPORT_DEFAULTS.postsFile,
    outputFile: process.env.REPORT_OUTPUT_FILE ?? REPORT_DEFAULTS.outputFile,
    startDate: process.env.REPORT_START_DATE ?? REPORT_DEFAULTS.startDate,
    endDate: process.env.REPORT_END_DATE ?? REPORT_DEFAULTS.endDate,
    brandTags: splitList(process.env.REPORT_BRAND_TAGS ?? REPORT_DEFAULTS.brandTags),
    mention: process.env.REPORT_MENTION ?? REPORT_DEFAULTS.mention,
    hashtag: process.env.REPORT_HASHTAG ?? REPORT_DEFAULTS.hashtag,
    title: process.env.REPORT_TITLE || REPORT_DEFAULTS.title,
    zeroFollowerPolicy: parseZeroFollowerPolicy(process.env.REPORT_ZERO_FOLLOWER_POLICY),
    templatesDir: process.env.REPORT_TEMPLATES_DIR ?? DEFAULT_TEMPLATES_DIR,
  }),
);

function parseZeroFollowerPolicy(value: string | undefined): ZeroFollowerPolicy {
  if (value === undefined) return ZeroFollowerPolicy.Error;

  const policy = Object.values(ZeroFollowerPolicy).find((candidate) => candidate === value);
  if (!policy) {
    throw new ReportError(`Unknown zero follower policy: ${value}`, 'config');
  }
  return policy;
}
