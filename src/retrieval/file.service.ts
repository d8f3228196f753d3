import { Injectable, UnsupportedMediaTypeException } from '@nestjs/common';
import { extname } from 'node:path';
import { Document, DocumentMetadata } from './retrieval.types';

const MIMETYPES_BY_EXTENSION: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.markdown': 'text/markdown',
  '.csv': 'text/csv',
  '.json': 'application/json',
};

const TEXT_MIMETYPES = new Set(['text/plain', 'text/markdown', 'text/x-markdown', 'text/csv', 'application/json']);

export type UploadedDocumentFile = Pick<Express.Multer.File, 'originalname' | 'mimetype' | 'buffer'>;

/** MIME type of an upload, guessed from its extension when the client sent none. */
export function resolveMimetype(file: Pick<Express.Multer.File, 'originalname' | 'mimetype'>): string {
  const declared = file.mimetype.split(';')[0].trim().toLowerCase();
  if (declared && declared !== 'application/octet-stream') {
    return declared;
  }
  return MIMETYPES_BY_EXTENSION[extname(file.originalname).toLowerCase()] ?? declared;
}

@Injectable()
export class FileService {
  async getDocumentFromFile(file: UploadedDocumentFile, metadata?: DocumentMetadata): Promise<Document> {
    const text = await this.extractText(file);
    return {
      text,
      metadata: {
        source: 'file',
        source_id: file.originalname,
        ...metadata,
      },
    };
  }

  async extractText(file: UploadedDocumentFile): Promise<string> {
    const mimetype = resolveMimetype(file);

    if (mimetype === 'application/pdf') {
      const { default: pdfParse } = await import('pdf-parse');
      const pdfData = await pdfParse(file.buffer);
      return pdfData.text;
    }

    if (TEXT_MIMETYPES.has(mimetype)) {
      return file.buffer.toString('utf8');
    }

    throw new UnsupportedMediaTypeException(`Unsupported file type: ${mimetype || 'unknown'}`);
  }
}
