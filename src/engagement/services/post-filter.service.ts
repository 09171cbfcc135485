import { Injectable } from '@nestjs/common';
import { ParseError } from '../../common/errors/report.errors';
import { CALENDAR_DATE_FORMAT, parseCalendarDate } from '../../common/utility/date.utils';
import { Post } from '../../dataset/interfaces/dataset.interface';

/**
 * Narrows posts by date window and brand tags. Both passes keep input order
 * and read only loaded fields, so they can run in either order.
 */
@Injectable()
export class PostFilterService {
  /**
   * Keeps posts with `start <= takenAt <= end`. Bounds are `YYYY-MM-DD` and
   * stand for UTC midnight of that day.
   */
  filterByDate<T extends Post>(posts: T[], start: string, end: string): T[] {
    const startDate = this.parseBound(start, 'start');
    const endDate = this.parseBound(end, 'end');

    if (startDate.getTime() > endDate.getTime()) {
      throw new ParseError(`Date window starts after it ends: ${start} > ${end}`, start, 'filter');
    }

    return posts.filter(
      (post) =>
        post.takenAt.getTime() >= startDate.getTime() &&
        post.takenAt.getTime() <= endDate.getTime(),
    );
  }

  /**
   * Keeps posts whose caption contains at least one tag as a literal substring.
   * An empty tag list keeps nothing.
   */
  filterByTags<T extends Post>(posts: T[], tags: readonly string[]): T[] {
    return posts.filter((post) => tags.some((tag) => post.captionText.includes(tag)));
  }

  private parseBound(value: string, bound: 'start' | 'end'): Date {
    const parsed = parseCalendarDate(value);
    if (!parsed) {
      throw new ParseError(
        `Invalid ${bound} date "${value}", expected ${CALENDAR_DATE_FORMAT}`,
        value,
        'filter',
      );
    }
    return parsed;
  }
}
