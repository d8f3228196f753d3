import { v4 as uuidv4 } from 'uuid';
import { Document, DocumentChunk } from '../retrieval/retrieval.types';

export interface ChunkingOptions {
  maxChars: number;
  overlapChars: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = { maxChars: 1000, overlapChars: 100 };
export const MIN_CHUNK_LENGTH_TO_EMBED = 5;
export const MAX_CHUNKS_PER_DOCUMENT = 10_000;

function clampPositiveInt(value: number, fallback: number): number {
  if (!Number.isFinite(value) || value <= 0) return fallback;
  return Math.floor(value);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Packs blank-line separated paragraphs into chunks of at most `maxChars`.
 * A paragraph longer than that is cut into overlapping windows.
 */
export function chunkText(input: string, options: ChunkingOptions = DEFAULT_CHUNKING): string[] {
  const maxChars = clampPositiveInt(options.maxChars, DEFAULT_CHUNKING.maxChars);
  const overlapChars = Math.min(Math.max(0, Math.floor(options.overlapChars)), Math.floor(maxChars / 2));

  const text = normalizeNewlines(input);
  if (!text.trim()) return [];

  const chunks: string[] = [];
  let current = '';

  const pushCurrent = () => {
    const trimmed = current.trim();
    if (trimmed) chunks.push(trimmed);
    current = '';
  };

  const pushLong = (para: string) => {
    let start = 0;
    while (start < para.length) {
      let end = Math.min(para.length, start + maxChars);
      // Never cut between the two halves of a surrogate pair.
      if (end < para.length && isHighSurrogate(para.charCodeAt(end - 1))) {
        end = end - 1 > start ? end - 1 : end + 1;
      }
      const slice = para.slice(start, end).trim();
      if (slice) chunks.push(slice);
      if (end >= para.length) break;
      let next = end - overlapChars;
      if (isLowSurrogate(para.charCodeAt(next))) next -= 1;
      start = next > start ? next : end;
    }
  };

  for (const raw of text.split(/\n\s*\n/g)) {
    const para = raw.trim();
    if (!para) continue;

    if (para.length > maxChars) {
      pushCurrent();
      pushLong(para);
      continue;
    }

    if (!current) {
      current = para;
    } else if (current.length + 2 + para.length <= maxChars) {
      current = `${current}\n\n${para}`;
    } else {
      pushCurrent();
      current = para;
    }
  }

  pushCurrent();
  return chunks;
}

/** Document with its final id, the one returned to the caller. */
export function withDocumentId(document: Document): Document & { id: string } {
  return { ...document, id: document.id || uuidv4() };
}

export function createDocumentChunks(
  document: Document & { id: string },
  options: ChunkingOptions = DEFAULT_CHUNKING,
): DocumentChunk[] {
  return chunkText(document.text, options)
    .filter((text) => text.length >= MIN_CHUNK_LENGTH_TO_EMBED)
    .slice(0, MAX_CHUNKS_PER_DOCUMENT)
    .map((text, index) => ({
      id: `${document.id}_${index}`,
      text,
      metadata: { ...document.metadata, document_id: document.id },
    }));
}

export function batched<T>(items: T[], size: number): T[][] {
  const step = clampPositiveInt(size, 1);
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += step) {
    batches.push(items.slice(start, start + step));
  }
  return batches;
}
