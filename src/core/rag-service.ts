import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { PDFProcessor } from './pdf-processor';
import { TextChunker } from './chunker';
import { embeddingService, type EmbeddingService } from './embeddings';
import { createVectorStore } from './vector-db';
import { VectorIndex } from './vector-index';
import { errorMessage, ParseError } from './errors';
import type { IndexManifest, IngestResponse, VectorStore } from '../types';

export interface RAGServiceOptions {
  pdfProcessor?: PDFProcessor;
  chunker?: TextChunker;
  embeddings?: EmbeddingService;
  vectorStore?: VectorStore;
  reuseIndex?: boolean;
}

/**
 * Turns one document into a queryable vector index.
 */
export class RAGService {
  private pdfProcessor: PDFProcessor;
  private chunker: TextChunker;
  private embeddings: EmbeddingService;
  private vectorIndex: VectorIndex;
  private reuseIndex: boolean;

  constructor(options: RAGServiceOptions = {}) {
    this.pdfProcessor = options.pdfProcessor ?? new PDFProcessor();
    this.chunker = options.chunker ?? new TextChunker();
    this.embeddings = options.embeddings ?? embeddingService;
    this.vectorIndex = new VectorIndex(this.embeddings, options.vectorStore ?? createVectorStore());
    this.reuseIndex = options.reuseIndex ?? config.rag.reuseIndex;
  }

  get index(): VectorIndex {
    return this.vectorIndex;
  }

  /**
   * Index a document (PDF or TXT). A matching persisted index is reused
   * instead of rebuilt.
   */
  async ingest(filePath: string): Promise<IngestResponse> {
    const startTime = Date.now();
    const source = path.basename(filePath);

    try {
      console.log(`Indexing document: ${filePath}`);

      this.pdfProcessor.validateFile(filePath);
      const fingerprint = await this.pdfProcessor.fingerprint(filePath);

      const persisted = this.reuseIndex ? await this.loadMatching(fingerprint, source) : null;
      if (persisted) {
        const metadata = await this.pdfProcessor.getMetadata(filePath);
        console.log(`Reusing persisted index for ${source} (${persisted.chunkCount} chunks)`);

        return {
          documentId: persisted.documentId,
          source,
          title: metadata?.title ?? source,
          pageCount: persisted.pageCount,
          chunkCount: this.vectorIndex.size,
          reused: true,
          processingTime: Date.now() - startTime
        };
      }

      const pages = await this.pdfProcessor.loadPages(filePath);
      const documentId = uuidv4();
      const chunks = this.chunker.chunkPages(pages, source, documentId);

      if (chunks.length === 0) {
        throw new ParseError('No text could be extracted from document');
      }
      console.log(`Created ${chunks.length} chunks`);

      const metadata = await this.pdfProcessor.getMetadata(filePath);
      const manifest: IndexManifest = {
        documentId,
        source,
        fingerprint,
        pageCount: pages.length,
        chunkCount: chunks.length,
        ...this.chunker.getSettings(),
        embeddingModel: this.embeddings.model,
        createdAt: new Date().toISOString()
      };

      await this.vectorIndex.build(chunks, manifest);

      const processingTime = Date.now() - startTime;
      console.log(`Document indexed successfully in ${processingTime}ms`, { documentId, chunks: chunks.length });

      return {
        documentId,
        source,
        title: metadata?.title ?? source,
        pageCount: pages.length,
        chunkCount: chunks.length,
        reused: false,
        processingTime
      };
    } catch (error) {
      console.error(`Document indexing failed: ${filePath}`, errorMessage(error));
      throw error;
    }
  }

  /**
   * A persisted index is only valid for the same bytes, file name, chunking and
   * embedding model; chunks carry the file name into prompts.
   */
  private async loadMatching(fingerprint: string, source: string): Promise<IndexManifest | null> {
    const { chunkSize, chunkOverlap } = this.chunker.getSettings();
    const matches = (manifest: IndexManifest) =>
      manifest.fingerprint === fingerprint &&
      manifest.source === source &&
      manifest.chunkSize === chunkSize &&
      manifest.chunkOverlap === chunkOverlap &&
      manifest.embeddingModel === this.embeddings.model;

    try {
      return await this.vectorIndex.load(matches);
    } catch (error) {
      if (error instanceof ParseError) {
        console.warn(`Ignoring unreadable persisted index: ${errorMessage(error)}`);
        return null;
      }
      throw error;
    }
  }
}

// Singleton instance
export const ragService = new RAGService();
