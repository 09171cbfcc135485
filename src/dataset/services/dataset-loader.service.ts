import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ParseError, ValidationError } from '../../common/errors/report.errors';
import { parseTimestamp } from '../../common/utility/date.utils';
import { PostRecordDto } from '../dto/post-record.dto';
import { UserRecordDto } from '../dto/user-record.dto';
import {
  CsvRow,
  DatasetSource,
  Post,
  POST_COLUMNS,
  User,
  USER_COLUMNS,
} from '../interfaces/dataset.interface';
import { CsvReaderService } from './csv-reader.service';

/**
 * Values substituted for missing post cells before validation.
 * `person_id` and `taken_at` have no default and stay required.
 */
export const POST_FIELD_DEFAULTS = {
  captionText: (): string => '',
  captionTags: (): string[] => [],
  likeCount: (): number => 0,
  commentCount: (): number => 0,
};

// Markers spreadsheet and dataframe exports write for an absent value
const NULL_MARKERS = new Set(['', 'NA', 'N/A', 'NaN', 'nan', 'null', 'NULL', 'None']);

type Table = 'users' | 'posts';

@Injectable()
export class DatasetLoaderService {
  private readonly logger = new Logger(DatasetLoaderService.name);

  constructor(private readonly csvReader: CsvReaderService) {}

  async loadUsers(source: DatasetSource): Promise<User[]> {
    const rows = await this.csvReader.read(source);
    const users = this.parseUsers(rows);
    this.logger.log(`Loaded ${users.length} users from ${this.describe(source)}`);
    return users;
  }

  async loadPosts(source: DatasetSource): Promise<Post[]> {
    const rows = await this.csvReader.read(source);
    const posts = this.parsePosts(rows);
    this.logger.log(`Loaded ${posts.length} posts from ${this.describe(source)}`);
    return posts;
  }

  parseUsers(rows: CsvRow[]): User[] {
    const seen = new Set<string>();

    return rows.map((row, index) => {
      const rowNum = index + 1;

      const record = plainToInstance(UserRecordDto, {
        id: normalizeId(this.requireCell(row, USER_COLUMNS.id, 'users', rowNum)),
        username: this.requireCell(row, USER_COLUMNS.username, 'users', rowNum),
        followerCount: parseCount(
          this.requireCell(row, USER_COLUMNS.followerCount, 'users', rowNum),
        ),
      });
      this.validateRecord(record, USER_COLUMNS, 'users', rowNum);

      if (seen.has(record.id)) {
        throw new ValidationError(
          `users row ${rowNum}: duplicate id ${record.id}`,
          USER_COLUMNS.id,
          rowNum,
        );
      }
      seen.add(record.id);

      return {
        id: record.id,
        username: record.username,
        followerCount: record.followerCount,
      };
    });
  }

  /**
   * Validates every row before any timestamp is parsed, so a missing field
   * anywhere in the table is reported ahead of an unreadable timestamp.
   */
  parsePosts(rows: CsvRow[]): Post[] {
    const records = rows.map((row, index) => this.toPostRecord(row, index + 1));

    return records.map((record, index) => {
      const takenAt = parseTimestamp(record.takenAt);
      if (!takenAt) {
        throw new ParseError(
          `posts row ${index + 1}: ${POST_COLUMNS.takenAt} "${record.takenAt}" is not a valid timestamp`,
          record.takenAt,
        );
      }

      return {
        authorId: record.authorId,
        takenAt,
        captionText: record.captionText,
        captionTags: record.captionTags,
        likeCount: record.likeCount,
        commentCount: record.commentCount,
      };
    });
  }

  private toPostRecord(row: CsvRow, rowNum: number): PostRecordDto {
    // Defaults first, then the required check
    const captionText =
      this.rawCell(row, POST_COLUMNS.captionText) ?? POST_FIELD_DEFAULTS.captionText();
    const tags = this.cell(row, POST_COLUMNS.captionTags);
    const likes = this.cell(row, POST_COLUMNS.likeCount);
    const comments = this.cell(row, POST_COLUMNS.commentCount);

    const record = plainToInstance(PostRecordDto, {
      authorId: normalizeId(this.requireCell(row, POST_COLUMNS.authorId, 'posts', rowNum)),
      takenAt: this.requireCell(row, POST_COLUMNS.takenAt, 'posts', rowNum),
      captionText,
      captionTags: tags === undefined ? POST_FIELD_DEFAULTS.captionTags() : parseTags(tags),
      likeCount: likes === undefined ? POST_FIELD_DEFAULTS.likeCount() : parseCount(likes),
      commentCount:
        comments === undefined ? POST_FIELD_DEFAULTS.commentCount() : parseCount(comments),
    });
    this.validateRecord(record, POST_COLUMNS, 'posts', rowNum);

    return record;
  }

  private validateRecord(
    record: object,
    columns: Readonly<Record<string, string>>,
    table: Table,
    rowNum: number,
  ): void {
    const [error] = validateSync(record, { stopAtFirstError: true });
    if (!error) return;

    const column = columns[error.property] ?? error.property;
    const message =
      Object.values(error.constraints ?? {})[0] ?? `${column} is invalid`;
    throw new ValidationError(`${table} row ${rowNum}: ${message}`, column, rowNum);
  }

  private requireCell(row: CsvRow, column: string, table: Table, rowNum: number): string {
    const value = this.cell(row, column);
    if (value === undefined) {
      throw new ValidationError(
        `${table} row ${rowNum}: ${column} is required`,
        column,
        rowNum,
      );
    }
    return value;
  }

  /** Trimmed cell value, or undefined when the cell is absent or a null marker. */
  private cell(row: CsvRow, column: string): string | undefined {
    const value = row[column]?.trim();
    return value === undefined || NULL_MARKERS.has(value) ? undefined : value;
  }

  /** Like `cell`, but keeps surrounding whitespace. Captions are matched as written. */
  private rawCell(row: CsvRow, column: string): string | undefined {
    const value = row[column];
    return value === undefined || NULL_MARKERS.has(value.trim()) ? undefined : value;
  }

  private describe(source: DatasetSource): string {
    return typeof source === 'string' ? source : 'memory';
  }
}

const DECIMAL_NUMBER = /^-?\d+(\.\d+)?$/;
const WHOLE_NUMBER_ID = /^\d+(\.0+)?$/;

/**
 * Plain decimal notation only. Hex, exponent and other forms become NaN and
 * fail the integer check.
 */
export function parseCount(value: string): number {
  return DECIMAL_NUMBER.test(value) ? Number(value) : Number.NaN;
}

/**
 * Writes numeric ids the same way in both tables: `1.0` and `01` become `1`.
 * Other ids are kept as they are.
 */
export function normalizeId(value: string): string {
  if (!WHOLE_NUMBER_ID.test(value)) return value;
  return value.replace(/\.0+$/, '').replace(/^0+(?=\d)/, '');
}

/**
 * Reads a caption tag cell: `['a', 'b']`, `["a","b"]` or `a,b`.
 * Commas inside a quoted tag belong to the tag.
 */
export function parseTags(value: string): string[] {
  const text = value.trim();
  const inner = text.startsWith('[') && text.endsWith(']') ? text.slice(1, -1) : text;

  const tags: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const char of inner) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if ((char === "'" || char === '"') && current.trim() === '') {
      current = '';
      quote = char;
    } else if (char === ',') {
      tags.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  tags.push(current);

  return tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}
