import { createHash } from 'crypto';
import * as fs from 'fs';
import { createRequire } from 'module';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { config } from '../config';
import { errorMessage, FileTooLargeError, NotFoundError, ParseError } from './errors';
import type { DocumentMetadata, PageRecord } from '../types';

// Use legacy build for Node.js compatibility
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs';

// Set worker source for PDF.js (legacy build for Node.js)
const require = createRequire(import.meta.url);
const pdfjsPath = path.dirname(require.resolve('pdfjs-dist/package.json'));
GlobalWorkerOptions.workerSrc = pathToFileURL(path.join(pdfjsPath, 'legacy/build/pdf.worker.mjs')).href;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class PDFProcessor {
  private readonly maxFileSizeMb: number;

  constructor(maxFileSizeMb: number = config.rag.maxFileSizeMb) {
    this.maxFileSizeMb = maxFileSizeMb;
  }

  /**
   * Check the file exists and is within the size limit.
   */
  validateFile(filePath: string): void {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new NotFoundError(filePath);
    }

    const stats = fs.statSync(filePath);
    const maxSizeBytes = this.maxFileSizeMb * 1024 * 1024;
    if (stats.size > maxSizeBytes) {
      throw new FileTooLargeError(filePath, stats.size, maxSizeBytes);
    }
  }

  /**
   * Extract one page record per page, in document order.
   * Plain text files are returned as a single page.
   */
  async loadPages(filePath: string): Promise<PageRecord[]> {
    const startTime = Date.now();
    this.validateFile(filePath);

    console.log(`Starting document extraction: ${filePath}`);

    if (filePath.toLowerCase().endsWith('.txt')) {
      const text = fs.readFileSync(filePath, 'utf-8');
      console.log(`Text extraction completed in ${Date.now() - startTime}ms`);
      return [{ text: normalizeWhitespace(text), pageNumber: 1 }];
    }

    const buffer = fs.readFileSync(filePath);
    // PDF files start with %PDF
    if (buffer.toString('ascii', 0, 4) !== '%PDF') {
      throw new ParseError(`Not a PDF document: ${filePath}`);
    }

    const pdf = await this.openDocument(new Uint8Array(buffer), filePath);

    try {
      console.log(`PDF loaded: ${pdf.numPages} pages`);

      const pages: PageRecord[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        try {
          const page = await pdf.getPage(pageNumber);
          const textContent = await page.getTextContent();
          const text = textContent.items
            .map(item => ('str' in item ? item.str : ''))
            .join(' ');
          pages.push({ text: normalizeWhitespace(text), pageNumber });
        } catch (pageError) {
          // Keep the page so numbering stays aligned with the document
          console.warn(`Failed to extract text from page ${pageNumber}:`, errorMessage(pageError));
          pages.push({ text: '', pageNumber });
        }

        if (pageNumber % 10 === 0) {
          console.log(`Processed ${pageNumber}/${pdf.numPages} pages`);
        }
      }

      const totalChars = pages.reduce((sum, page) => sum + page.text.length, 0);
      console.log(`PDF extraction completed in ${Date.now() - startTime}ms (${pdf.numPages} pages, ${totalChars} chars)`);

      return pages;
    } finally {
      await pdf.destroy();
    }
  }

  /**
   * Get document metadata, or null when it cannot be read
   */
  async getMetadata(filePath: string): Promise<DocumentMetadata | null> {
    try {
      const stats = fs.statSync(filePath);
      const fileName = path.basename(filePath);
      const stem = path.basename(filePath, path.extname(filePath));

      if (filePath.toLowerCase().endsWith('.txt')) {
        return { pages: 1, title: stem, fileSize: stats.size, fileName };
      }

      const pdf = await this.openDocument(new Uint8Array(fs.readFileSync(filePath)), filePath);
      try {
        const { info } = await pdf.getMetadata();
        const title = isRecord(info) && typeof info.Title === 'string' && info.Title.trim() ? info.Title.trim() : stem;
        const author = isRecord(info) && typeof info.Author === 'string' && info.Author.trim() ? info.Author.trim() : undefined;

        return { pages: pdf.numPages, title, author, fileSize: stats.size, fileName };
      } finally {
        await pdf.destroy();
      }
    } catch (error) {
      console.warn(`Could not get document metadata: ${filePath}`, errorMessage(error));
      return null;
    }
  }

  /**
   * SHA-256 of the file contents
   */
  async fingerprint(filePath: string): Promise<string> {
    const data = await fs.promises.readFile(filePath);
    return createHash('sha256').update(data).digest('hex');
  }

  private async openDocument(data: Uint8Array, filePath: string) {
    return getDocument({ data, verbosity: 0 }).promise.catch((pdfError: unknown) => {
      throw new ParseError(`Failed to parse PDF ${filePath}: ${errorMessage(pdfError)}`, { cause: pdfError });
    });
  }
}
