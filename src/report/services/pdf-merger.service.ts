import { Injectable } from '@nestjs/common';
import { PDFDocument } from 'pdf-lib';

@Injectable()
export class PdfMergerService {
  /** Concatenates the pages of every input PDF, in order, into one document. */
  async merge(pdfs: Uint8Array[]): Promise<Buffer> {
    const merged = await PDFDocument.create();

    for (const bytes of pdfs) {
      const source = await PDFDocument.load(bytes);
      const pages = await merged.copyPages(source, source.getPageIndices());
      pages.forEach((page) => merged.addPage(page));
    }

    return Buffer.from(await merged.save());
  }
}
