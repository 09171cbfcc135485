import { PageLayoutOptions } from './interfaces/report.interface';

export const TITLE_PAGE_LAYOUT: PageLayoutOptions = {
  orientation: 'landscape',
  size: 'LETTER',
  margins: { top: 0, right: 0, bottom: 0, left: 0 },
  align: 'center',
  verticalAlign: 'middle',
};

export const BODY_LAYOUT: PageLayoutOptions = {
  orientation: 'landscape',
  size: 'LETTER',
  margins: { top: 1.1, right: 0.9, bottom: 1.1, left: 0.9 },
  header: { left: '[title]', right: 'Page [page]/[toPage]' },
  footer: { center: 'Generated [date]' },
};
