// src/services/pdf-renderer.service.ts
import PDFDocument from 'pdfkit';
import { logger } from '../core/logger';
import { RenderError, errorMessage } from '../core/errors';
import { DocumentRenderer, NarrativeSection, ReportDocument, TableSection, TotalsSection } from '../types';

const MARGIN = 48;
const ROW_GAP = 0.6;
const BRAND_BLUE = '#003366';
const RULE_GRAY = '#cccccc';

// Standard PDF fonts only cover WinAnsi; fold the usual typographic characters first
const PDF_REPLACEMENTS: Record<string, string> = {
  '\u2013': '-',
  '\u2014': '--',
  '\u2018': "'",
  '\u2019': "'",
  '\u201c': '"',
  '\u201d': '"',
  '\u2026': '...',
  '\u2022': '*',
  '\u00a0': ' ',
  '\u200b': '',
  '\u2010': '-',
  '\u2011': '-',
  '\u2012': '-',
  '\u00b7': '*',
  '\u2032': "'",
  '\u2033': '"',
  '\u00ae': '(R)',
  '\u2122': '(TM)',
  '\u00a9': '(C)',
};

export function sanitizeForPdf(text: string): string {
  let result = '';
  for (const ch of text) {
    const replacement = PDF_REPLACEMENTS[ch];
    if (replacement !== undefined) {
      result += replacement;
    } else if (ch.charCodeAt(0) <= 0xff) {
      result += ch;
    } else {
      const ascii = ch.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
      result += ascii || '?';
    }
  }
  return result;
}

type Pdf = PDFKit.PDFDocument;

export class PdfRenderer implements DocumentRenderer {
  render(report: ReportDocument): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const fail = (error: unknown) => {
        logger.error('PDF rendering failed', { title: report.title, error: errorMessage(error) });
        reject(new RenderError(`Could not render report: ${errorMessage(error)}`));
      };

      try {
        const chunks: Buffer[] = [];
        const doc = new PDFDocument({
          size: 'LETTER',
          layout: 'landscape',
          margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
          info: {
            Title: sanitizeForPdf(`${report.title} - ${report.clientLabel}`),
            Subject: 'Executive claims report',
            CreationDate: new Date(`${report.reportDate}T00:00:00Z`),
          },
        });

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', fail);

        for (const section of report.sections) {
          switch (section.kind) {
            case 'narrative':
              this.drawNarrative(doc, section);
              break;
            case 'totals':
              this.drawTotals(doc, section);
              break;
            case 'table':
              this.drawTable(doc, section);
              break;
          }
          doc.moveDown(1);
        }

        doc.end();
      } catch (error) {
        fail(error);
      }
    });
  }

  private sectionHeader(doc: Pdf, title: string, size: number = 13): void {
    doc.x = doc.page.margins.left;
    doc.fontSize(size).font('Helvetica-Bold').fillColor(BRAND_BLUE).text(sanitizeForPdf(title));
    doc.moveDown(0.4);
    doc.fillColor('#000000');
  }

  private drawNarrative(doc: Pdf, section: NarrativeSection): void {
    if (section.title) {
      this.sectionHeader(doc, section.title, 20);
    }
    doc.fontSize(11).font('Helvetica');
    for (const paragraph of section.paragraphs) {
      doc.text(sanitizeForPdf(paragraph), { lineGap: 2 });
    }
  }

  private drawTotals(doc: Pdf, section: TotalsSection): void {
    this.sectionHeader(doc, section.title);
    doc.fontSize(11);
    for (const entry of section.entries) {
      doc.font('Helvetica-Bold').text(`${sanitizeForPdf(entry.label)}: `, { continued: true });
      doc.font('Helvetica').text(sanitizeForPdf(entry.value));
    }
  }

  private drawTable(doc: Pdf, section: TableSection): void {
    this.sectionHeader(doc, section.title);

    const startX = doc.page.margins.left;
    const contentWidth = doc.page.width - doc.page.margins.left - doc.page.margins.right;
    const colWidth = contentWidth / Math.max(section.columns.length, 1);
    const bottomLimit = doc.page.height - doc.page.margins.bottom - 24;

    const drawRow = (cells: readonly string[], bold: boolean) => {
      const y = doc.y;
      doc.fontSize(9).font(bold ? 'Helvetica-Bold' : 'Helvetica');
      let rowBottom = y;
      cells.forEach((cell, index) => {
        doc.text(sanitizeForPdf(cell), startX + index * colWidth, y, { width: colWidth - 6 });
        rowBottom = Math.max(rowBottom, doc.y);
      });
      doc.y = rowBottom;
      doc.moveDown(ROW_GAP / 2);
    };

    const drawHeader = () => {
      drawRow(section.columns, true);
      doc.moveTo(startX, doc.y).lineTo(startX + contentWidth, doc.y).stroke(RULE_GRAY);
      doc.moveDown(ROW_GAP / 2);
    };

    drawHeader();
    for (const row of section.rows) {
      if (doc.y > bottomLimit) {
        doc.addPage();
        drawHeader();
      }
      drawRow(row, false);
    }
    doc.x = startX;
  }
}

export const pdfRenderer = new PdfRenderer();
