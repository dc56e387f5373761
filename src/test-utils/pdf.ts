import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import PDFDocument from 'pdfkit';

export interface TestPdfOptions {
  title?: string;
  author?: string;
}

/**
 * Render one Helvetica text line per page.
 * An empty string produces a page without text.
 */
export function buildPdf(pageTexts: string[], options: TestPdfOptions = {}): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const info: { Title?: string; Author?: string } = {};
    if (options.title) info.Title = options.title;
    if (options.author) info.Author = options.author;

    const doc = new PDFDocument({ autoFirstPage: false, margin: 72, info });
    const chunks: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    for (const text of pageTexts) {
      doc.addPage();
      if (text) {
        doc.font('Helvetica').fontSize(12).text(text);
      }
    }

    doc.end();
  });
}

export function makeTempDir(prefix = 'docchat-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
