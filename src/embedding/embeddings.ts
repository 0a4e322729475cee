import { z } from 'zod';
import { EmbeddingError, ValidationError, errorMessage } from '../errors.js';
import type { EmbedderProviderConfig } from '../config/index.js';
import { l2Normalize } from '../storage/vector.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';

// Embedding dimension for all-MiniLM-L6-v2, the size the hash embedder mimics
export const LOCAL_EMBEDDING_DIM = 384;

// Embedding dimension for Ollama nomic-embed-text
export const OLLAMA_EMBEDDING_DIM = 768;

// text-embedding-3-small
export const OPENAI_EMBEDDING_DIM = 1536;

/**
 * Opaque embedding collaborator. Callers skip `embed` for empty or
 * whitespace-only text; implementations are not required to handle it.
 */
export interface EmbeddingService {
  readonly dimension: number;
  readonly name: string;
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

// 32-bit FNV-1a over code points
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (const char of text) {
    hash ^= char.codePointAt(0) ?? 0;
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

const WORD_WEIGHT = 1;
const TRIGRAM_WEIGHT = 0.5;

/**
 * Feature-hashing embedder for tests and offline use. Lowercased words and
 * their character trigrams are hashed into signed buckets, then the vector
 * is L2-normalized. Texts sharing words or word fragments score closer
 * together; nothing here is semantic.
 */
export class SimpleEmbedder implements EmbeddingService {
  readonly name = 'simple';

  constructor(readonly dimension: number = LOCAL_EMBEDDING_DIM) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
  }

  async initialize(): Promise<void> {}

  async embed(text: string): Promise<Float32Array> {
    return this.featureHash(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.featureHash(text));
  }

  private featureHash(text: string): Float32Array {
    const vector = new Float32Array(this.dimension);
    const add = (feature: string, weight: number): void => {
      const hash = fnv1a(feature);
      vector[hash % this.dimension] += hash & 0x80000000 ? -weight : weight;
    };

    const words = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
    for (const word of words) {
      add(`w:${word}`, WORD_WEIGHT);
      const padded = [...` ${word} `];
      for (let i = 0; i + 3 <= padded.length; i++) {
        add(`t:${padded.slice(i, i + 3).join('')}`, TRIGRAM_WEIGHT);
      }
    }
    if (words.length === 0) {
      // Punctuation-only text still gets a direction of its own
      add(`r:${text}`, WORD_WEIGHT);
    }

    return l2Normalize(vector);
  }
}

function checkDimensions(vectors: number[][], inputs: number, dimension: number, provider: string): Float32Array[] {
  if (vectors.length !== inputs) {
    throw new EmbeddingError(`${provider} returned ${vectors.length} embeddings for ${inputs} inputs`);
  }
  return vectors.map((vector, index) => {
    if (vector.length !== dimension) {
      throw new EmbeddingError(
        `${provider} returned ${vector.length} dimensions for input ${index}, expected ${dimension}`
      );
    }
    return Float32Array.from(vector);
  });
}

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const OllamaEmbedSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbedder implements EmbeddingService {
  readonly name = 'ollama';
  private logger: Logger;

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text',
    readonly dimension: number = OLLAMA_EMBEDDING_DIM,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'embedder', provider: this.name });
  }

  async initialize(): Promise<void> {
    let hasModel: boolean;
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) {
        throw new Error(`status ${response.status}`);
      }
      const data = OllamaTagsSchema.parse(await response.json());
      hasModel = data.models.some((m) => m.name.includes(this.model));
    } catch (error) {
      throw new EmbeddingError(`Failed to connect to Ollama at ${this.baseUrl}: ${errorMessage(error)}`, { cause: error });
    }

    if (!hasModel) {
      this.logger.warn('embedder.model_missing', { model: this.model });
      await this.pullModel();
    }
  }

  private async pullModel(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/api/pull`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: this.model }),
    });

    if (!response.ok) {
      throw new EmbeddingError(`Failed to pull model ${this.model}`);
    }

    // Wait for pull to complete (streaming response)
    const reader = response.body?.getReader();
    if (reader) {
      while (true) {
        const { done } = await reader.read();
        if (done) break;
      }
    }
    this.logger.info('embedder.model_pulled', { model: this.model });
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        input: texts,
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new EmbeddingError(`Ollama embedding failed: ${error}`);
    }

    const data = OllamaEmbedSchema.parse(await response.json());
    return checkDimensions(data.embeddings, texts.length, this.dimension, 'Ollama');
  }
}

const OpenAIEmbeddingSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() })),
});

export class OpenAIEmbedder implements EmbeddingService {
  readonly name = 'openai';

  constructor(
    private apiKey: string,
    private model: string = 'text-embedding-3-small',
    readonly dimension: number = OPENAI_EMBEDDING_DIM,
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {}

  async initialize(): Promise<void> {
    try {
      await this.embed('test');
    } catch (error) {
      throw new EmbeddingError(`OpenAI API key invalid: ${errorMessage(error)}`, { cause: error });
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
        ...(this.dimension !== OPENAI_EMBEDDING_DIM ? { dimensions: this.dimension } : {}),
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new EmbeddingError(`OpenAI embedding failed: ${error}`);
    }

    const data = OpenAIEmbeddingSchema.parse(await response.json());

    // Sort by index to maintain order
    const sorted = [...data.data].sort((a, b) => a.index - b.index);
    return checkDimensions(sorted.map((d) => d.embedding), texts.length, this.dimension, 'OpenAI');
  }
}

export async function createEmbedder(
  config: EmbedderProviderConfig,
  logger: Logger = silentLogger
): Promise<EmbeddingService> {
  let embedder: EmbeddingService;

  switch (config.provider) {
    case 'simple':
      embedder = new SimpleEmbedder(config.dimension ?? LOCAL_EMBEDDING_DIM);
      break;

    case 'ollama':
      embedder = new OllamaEmbedder(
        config.url ?? 'http://127.0.0.1:11434',
        config.model ?? 'nomic-embed-text',
        config.dimension ?? OLLAMA_EMBEDDING_DIM,
        logger
      );
      break;

    case 'openai':
      if (!config.apiKey) {
        throw new ValidationError('OpenAI API key required for OpenAI embeddings');
      }
      embedder = new OpenAIEmbedder(
        config.apiKey,
        config.model ?? 'text-embedding-3-small',
        config.dimension ?? OPENAI_EMBEDDING_DIM,
        config.url ?? 'https://api.openai.com/v1'
      );
      break;
  }

  await embedder.initialize();
  return embedder;
}
