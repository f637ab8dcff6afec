/**
 * Embedding service
 *
 * Text embeddings from an Ollama server's embed endpoint. The client is
 * created on first use; texts are sent in batches and every vector comes back
 * at unit length.
 */

import { TransientError, withTimeout } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

type OllamaClient = import('ollama').Ollama;

export interface Embedder {
  /** One vector per input text, same order */
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingServiceOptions {
  /** Default: http://localhost:11434 */
  host?: string;
  model?: string;
  batchSize?: number;
  /** Per-batch wall-clock limit */
  timeoutMs?: number;
  /** Characters kept per text */
  maxChars?: number;
  logger?: Logger;
}

export class EmbeddingService implements Embedder {
  private client: OllamaClient | null = null;
  private readonly host: string;
  private readonly model: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly maxChars: number;
  private readonly logger: Logger;

  constructor(options: EmbeddingServiceOptions = {}) {
    this.host = options.host ?? 'http://localhost:11434';
    this.model = options.model ?? 'nomic-embed-text';
    this.batchSize = options.batchSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.maxChars = options.maxChars ?? 2000;
    this.logger = options.logger ?? silentLogger;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const client = await this.getClient();
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize).map((text) => text.slice(0, this.maxChars));
      const embedded = await withTimeout(this.embedOne(client, batch, i), this.timeoutMs, 'Embedding batch');
      vectors.push(...embedded);
      this.logger.debug(`Embedded ${Math.min(i + this.batchSize, texts.length)}/${texts.length}`);
    }

    return vectors;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  private async embedOne(client: OllamaClient, batch: string[], offset: number): Promise<number[][]> {
    let embeddings: number[][];
    try {
      ({ embeddings } = await client.embed({ model: this.model, input: batch }));
    } catch (error) {
      throw new TransientError(
        `Embedding failed for batch starting at ${offset} (model ${this.model} at ${this.host}): ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (embeddings.length !== batch.length) {
      throw new TransientError(`Embedding backend returned ${embeddings.length} vectors for ${batch.length} texts`);
    }
    return embeddings.map(normalizeVector);
  }

  private async getClient(): Promise<OllamaClient> {
    if (!this.client) {
      const { Ollama } = await import('ollama');
      this.client = new Ollama({ host: this.host });
      this.logger.info(`Embedding with ${this.model} via ${this.host}`);
    }
    return this.client;
  }
}

/**
 * Scale a vector to unit length. The zero vector is returned unchanged.
 */
export function normalizeVector(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (norm === 0) return vector;
  return vector.map((val) => val / norm);
}

/**
 * Cosine similarity; 0 when either vector is all zeros or lengths differ.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
