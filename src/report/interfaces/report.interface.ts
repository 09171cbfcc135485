export type PageOrientation = 'portrait' | 'landscape';

export type PageSize = 'LETTER' | 'LEGAL' | 'A4';

/** Margins in inches. */
export interface PageMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Text drawn in the page header or footer. Supports the placeholders
 * `[page]`, `[toPage]`, `[title]` and `[date]`.
 */
export interface HeaderFooterSlots {
  left?: string;
  center?: string;
  right?: string;
}

export interface PageLayoutOptions {
  orientation: PageOrientation;
  size: PageSize;
  margins: PageMargins;
  header?: HeaderFooterSlots;
  footer?: HeaderFooterSlots;
  align?: 'left' | 'center';
  verticalAlign?: 'top' | 'middle';
  title?: string;
  date?: string;
}

export interface ReportSummary {
  outputPath: string;
  htmlPaths: string[];
  usersLoaded: number;
  postsLoaded: number;
  postsKept: number;
  rankedUsers: number;
}
