import { aggregate } from '../services/aggregation.service';
import { PdfRenderer, sanitizeForPdf } from '../services/pdf-renderer.service';
import { assemble } from '../services/report.service';
import { claim } from './helpers/fakes';

describe('sanitizeForPdf', () => {
  test('should fold typographic punctuation to plain text', () => {
    expect(sanitizeForPdf('“Ocean” – Partners…')).toBe('"Ocean" - Partners...');
    expect(sanitizeForPdf('Acme™ © 2026')).toBe('Acme(TM) (C) 2026');
  });

  test('should keep Latin-1 letters and strip accents from the rest', () => {
    expect(sanitizeForPdf('Café')).toBe('Café');
    expect(sanitizeForPdf('Łódź')).toBe('?ódz');
  });
});

describe('PdfRenderer', () => {
  const renderer = new PdfRenderer();
  const reportDate = new Date('2026-03-01T00:00:00Z');

  test('should render an empty report', async () => {
    const document = assemble('Nobody', { clientMatcher: 'Nobody' }, aggregate([]), [], { reportDate });

    const buffer = await renderer.render(document);

    expect(buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  test('should render a report spanning several pages', async () => {
    const matches = Array.from({ length: 120 }, (_, index) =>
      claim(`r${index}`, {
        clientName: 'Jasmin Hotels – Downtown',
        amount: String(1000 + index),
        policyYear: 2020 + (index % 6),
      })
    );
    const document = assemble('Jasmin Hotels', { clientMatcher: 'Jasmin' }, aggregate(matches), matches, { reportDate });

    const buffer = await renderer.render(document);

    expect(buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    const pages = buffer.toString('latin1').match(/\/Type \/Page[^s]/g) ?? [];
    expect(pages.length).toBeGreaterThan(1);
  });
});
