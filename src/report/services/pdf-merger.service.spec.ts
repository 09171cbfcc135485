import { Test, TestingModule } from '@nestjs/testing';
import { PDFDocument } from 'pdf-lib';
import { PdfMergerService } from './pdf-merger.service';

const pdfWithPages = async (...widths: number[]): Promise<Uint8Array> => {
  const document = await PDFDocument.create();
  widths.forEach((width) => document.addPage([width, 400]));
  return document.save();
};

describe('PdfMergerService', () => {
  let service: PdfMergerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [PdfMergerService],
    }).compile();

    service = module.get<PdfMergerService>(PdfMergerService);
  });

  it('concatenates pages in input order', async () => {
    const merged = await service.merge([await pdfWithPages(100), await pdfWithPages(200, 300)]);

    const document = await PDFDocument.load(merged);
    expect(document.getPageCount()).toBe(3);
    expect(document.getPages().map((page) => page.getWidth())).toEqual([100, 200, 300]);
  });

  it('produces an empty document for no inputs', async () => {
    const merged = await service.merge([]);

    const document = await PDFDocument.load(merged);
    expect(document.getPageCount()).toBe(0);
  });
});
