export interface EmbeddingProvider {
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}
