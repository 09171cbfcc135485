import { Injectable } from '@nestjs/common';
import { type CheerioAPI, load } from 'cheerio';
import PDFDocument from 'pdfkit';
import {
  HeaderFooterSlots,
  PageLayoutOptions,
  PageMargins,
} from '../interfaces/report.interface';

const POINTS_PER_INCH = 72;

const REGULAR_FONT = 'Helvetica';
const BOLD_FONT = 'Helvetica-Bold';
const HEADING_SIZES: Record<number, number> = { 1: 28, 2: 18, 3: 14 };
const BODY_SIZE = 11;
const TABLE_SIZE = 8;
const HEADER_FOOTER_SIZE = 9;
const CELL_PADDING = 4;
const BLOCK_GAP = 10;
const NUMERIC_CELL = /^-?[\d,]+(\.\d+)?%?$/;

type HtmlBlock =
  | { kind: 'heading'; level: number; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'table'; header: string[]; rows: string[][] };

export interface Placeholders {
  page: string;
  toPage: string;
  title: string;
  date: string;
}

/**
 * Converts the report HTML into a paginated PDF. Only the block structure the
 * report templates use is read: h1-h3 headings, paragraphs and tables.
 * Tables break across pages and repeat their header row.
 */
@Injectable()
export class PdfConverterService {
  async convert(html: string, layout: PageLayoutOptions): Promise<Buffer> {
    const $ = load(html);
    const blocks = this.extractBlocks($);
    const title = layout.title ?? $('title').first().text().trim();

    const doc = new PDFDocument({
      size: layout.size,
      layout: layout.orientation,
      margins: this.toPoints(layout.margins),
      bufferPages: true,
      info: { Title: title },
    });
    const output = this.collect(doc);

    if (layout.verticalAlign === 'middle') {
      const height = blocks.reduce((sum, block) => sum + this.measureBlock(doc, block, layout), 0);
      doc.y = Math.max(doc.page.margins.top, (doc.page.height - height) / 2);
    }

    for (const block of blocks) {
      this.drawBlock(doc, block, layout);
    }

    this.drawHeaderFooter(doc, layout, title);
    doc.end();

    return output;
  }

  private extractBlocks($: CheerioAPI): HtmlBlock[] {
    const blocks: HtmlBlock[] = [];

    $('body')
      .find('h1, h2, h3, p, table')
      .each((_, element) => {
        const node = $(element);
        if (node.parents('table').length > 0) return;

        const tag = element.tagName.toLowerCase();
        if (tag === 'table') {
          const rows = node
            .find('tr')
            .toArray()
            .map((row) => ({
              isHeader: $(row).parent('thead').length > 0 || $(row).children('td').length === 0,
              cells: $(row)
                .children('th, td')
                .toArray()
                .map((cell) => normalizeText($(cell).text())),
            }));

          blocks.push({
            kind: 'table',
            header: rows.find((row) => row.isHeader)?.cells ?? [],
            rows: rows.filter((row) => !row.isHeader).map((row) => row.cells),
          });
          return;
        }

        const text = normalizeText(node.text());
        if (!text) return;

        if (tag === 'p') {
          blocks.push({ kind: 'paragraph', text });
        } else {
          blocks.push({ kind: 'heading', level: Number(tag.slice(1)), text });
        }
      });

    return blocks;
  }

  private drawBlock(doc: PDFKit.PDFDocument, block: HtmlBlock, layout: PageLayoutOptions): void {
    if (block.kind === 'table') {
      this.drawTable(doc, block.header, block.rows);
      return;
    }

    this.useTextFont(doc, block);
    doc.fillColor('#000000').text(block.text, doc.page.margins.left, doc.y, {
      width: this.contentWidth(doc),
      align: layout.align ?? 'left',
    });
    doc.moveDown(0.5);
  }

  private measureBlock(doc: PDFKit.PDFDocument, block: HtmlBlock, layout: PageLayoutOptions): number {
    if (block.kind === 'table') {
      const widths = this.columnWidths(block.header, block.rows, this.contentWidth(doc));
      const rows = block.header.length > 0 ? [block.header, ...block.rows] : block.rows;
      return rows.reduce(
        (sum, row, index) =>
          sum + this.rowHeight(doc, row, widths, index === 0 && block.header.length > 0),
        BLOCK_GAP,
      );
    }

    this.useTextFont(doc, block);
    const textHeight = doc.heightOfString(block.text, {
      width: this.contentWidth(doc),
      align: layout.align ?? 'left',
    });
    return textHeight + doc.currentLineHeight() * 0.5;
  }

  private useTextFont(doc: PDFKit.PDFDocument, block: Exclude<HtmlBlock, { kind: 'table' }>): void {
    if (block.kind === 'heading') {
      doc.font(BOLD_FONT).fontSize(HEADING_SIZES[block.level] ?? BODY_SIZE);
    } else {
      doc.font(REGULAR_FONT).fontSize(BODY_SIZE);
    }
  }

  private drawTable(doc: PDFKit.PDFDocument, header: string[], rows: string[][]): void {
    const left = doc.page.margins.left;
    const widths = this.columnWidths(header, rows, this.contentWidth(doc));
    let y = doc.y;

    const drawHeader = () => {
      if (header.length > 0) {
        y = this.drawRow(doc, header, widths, left, y, true);
      }
    };

    const headerHeight = header.length > 0 ? this.rowHeight(doc, header, widths, true) : 0;
    const firstRowHeight = rows.length > 0 ? this.rowHeight(doc, rows[0], widths, false) : 0;
    if (y + headerHeight + firstRowHeight > this.bottomLimit(doc)) {
      doc.addPage();
      y = doc.page.margins.top;
    }
    drawHeader();

    for (const row of rows) {
      if (y + this.rowHeight(doc, row, widths, false) > this.bottomLimit(doc)) {
        doc.addPage();
        y = doc.page.margins.top;
        drawHeader();
      }
      y = this.drawRow(doc, row, widths, left, y, false);
    }

    doc.x = left;
    doc.y = y + BLOCK_GAP;
  }

  private drawRow(
    doc: PDFKit.PDFDocument,
    cells: string[],
    widths: number[],
    left: number,
    y: number,
    header: boolean,
  ): number {
    const height = this.rowHeight(doc, cells, widths, header);
    const tableWidth = widths.reduce((sum, width) => sum + width, 0);

    if (header) {
      doc.rect(left, y, tableWidth, height).fill('#eeeeee');
    }

    let x = left;
    widths.forEach((width, index) => {
      const text = cells[index] ?? '';
      doc
        .font(header ? BOLD_FONT : REGULAR_FONT)
        .fontSize(TABLE_SIZE)
        .fillColor('#000000')
        .text(text, x + CELL_PADDING, y + CELL_PADDING, {
          width: width - CELL_PADDING * 2,
          align: !header && NUMERIC_CELL.test(text) ? 'right' : 'left',
        });
      x += width;
    });

    doc
      .moveTo(left, y + height)
      .lineTo(left + tableWidth, y + height)
      .lineWidth(0.5)
      .strokeColor('#cccccc')
      .stroke();

    return y + height;
  }

  private rowHeight(doc: PDFKit.PDFDocument, cells: string[], widths: number[], header: boolean): number {
    doc.font(header ? BOLD_FONT : REGULAR_FONT).fontSize(TABLE_SIZE);

    const tallest = widths.reduce((max, width, index) => {
      const height = doc.heightOfString(cells[index] || ' ', {
        width: width - CELL_PADDING * 2,
      });
      return Math.max(max, height);
    }, 0);

    return tallest + CELL_PADDING * 2;
  }

  /** Splits the width by the longest text in each column, within bounds. */
  private columnWidths(header: string[], rows: string[][], totalWidth: number): number[] {
    const columnCount = Math.max(header.length, ...rows.map((row) => row.length), 1);
    const weights = Array.from({ length: columnCount }, (_, index) => {
      const longest = [header, ...rows].reduce(
        (max, row) => Math.max(max, (row[index] ?? '').length),
        0,
      );
      return Math.min(Math.max(longest, 4), 24);
    });
    const weightSum = weights.reduce((sum, weight) => sum + weight, 0);

    return weights.map((weight) => (totalWidth * weight) / weightSum);
  }

  private drawHeaderFooter(doc: PDFKit.PDFDocument, layout: PageLayoutOptions, title: string): void {
    if (!layout.header && !layout.footer) return;

    const range = doc.bufferedPageRange();
    for (let index = range.start; index < range.start + range.count; index++) {
      doc.switchToPage(index);

      const values: Placeholders = {
        page: String(index - range.start + 1),
        toPage: String(range.count),
        title,
        date: layout.date ?? '',
      };
      const { top, bottom } = doc.page.margins;

      // Text inside the bottom margin would otherwise start a new page
      doc.page.margins.bottom = 0;
      if (layout.header) {
        this.drawSlots(doc, layout.header, values, (top - HEADER_FOOTER_SIZE) / 2);
      }
      if (layout.footer) {
        this.drawSlots(
          doc,
          layout.footer,
          values,
          doc.page.height - (bottom + HEADER_FOOTER_SIZE) / 2,
        );
      }
      doc.page.margins.bottom = bottom;
    }
  }

  private drawSlots(
    doc: PDFKit.PDFDocument,
    slots: HeaderFooterSlots,
    values: Placeholders,
    y: number,
  ): void {
    const left = doc.page.margins.left;
    const width = this.contentWidth(doc);
    const alignments = [
      ['left', slots.left],
      ['center', slots.center],
      ['right', slots.right],
    ] as const;

    doc.font(REGULAR_FONT).fontSize(HEADER_FOOTER_SIZE).fillColor('#555555');
    for (const [align, template] of alignments) {
      if (!template) continue;
      doc.text(fillPlaceholders(template, values), left, y, { width, align, lineBreak: false });
    }
    doc.fillColor('#000000');
  }

  private contentWidth(doc: PDFKit.PDFDocument): number {
    return doc.page.width - doc.page.margins.left - doc.page.margins.right;
  }

  private bottomLimit(doc: PDFKit.PDFDocument): number {
    return doc.page.height - doc.page.margins.bottom;
  }

  private toPoints(margins: PageMargins): PageMargins {
    return {
      top: margins.top * POINTS_PER_INCH,
      right: margins.right * POINTS_PER_INCH,
      bottom: margins.bottom * POINTS_PER_INCH,
      left: margins.left * POINTS_PER_INCH,
    };
  }

  private collect(doc: PDFKit.PDFDocument): Promise<Buffer> {
    const chunks: Buffer[] = [];

    return new Promise((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });
  }
}

function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function fillPlaceholders(template: string, values: Placeholders): string {
  return template
    .replace(/\[page\]/g, values.page)
    .replace(/\[toPage\]/g, values.toPage)
    .replace(/\[title\]/g, values.title)
    .replace(/\[date\]/g, values.date);
}
