import { z } from 'zod';
import {
  AlreadyExistsError,
  ComputationError,
  EmbeddingError,
  LOCI_ERROR_CODES,
  NoDataError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isLociError,
} from '../errors.js';
import type { LociError } from '../errors.js';
import { Clusterer } from './clusterer.js';

// Messages exchanged with a clustering worker. Vectors travel as
// Float32Arrays, which structured clone copies without reboxing.

const ClusterJobSchema = z.object({
  id: z.number().int(),
  vectors: z.array(z.instanceof(Float32Array)),
  metric: z.enum(['cosine', 'euclidean']),
  options: z.object({
    minClusterSize: z.number(),
    minSamples: z.number(),
    selectionMethod: z.enum(['eom', 'leaf']).optional(),
  }),
});

const ClusterReplySchema = z.discriminatedUnion('type', [
  z.object({
    id: z.number().int(),
    type: z.literal('result'),
    result: z.object({
      labels: z.array(z.number().int()),
      clusterCount: z.number().int().nonnegative(),
      noiseCount: z.number().int().nonnegative(),
      probabilities: z.array(z.number()),
    }),
  }),
  z.object({
    id: z.number().int(),
    type: z.literal('error'),
    code: z.enum(LOCI_ERROR_CODES),
    message: z.string(),
  }),
]);

export type ClusterJob = z.infer<typeof ClusterJobSchema>;

export type ClusterReply = z.infer<typeof ClusterReplySchema>;

/** Worker side: run one job and describe the outcome as a reply. Never throws. */
export function handleClusterMessage(message: unknown): ClusterReply {
  const parsed = ClusterJobSchema.safeParse(message);
  if (!parsed.success) {
    return { id: -1, type: 'error', code: 'VALIDATION', message: `Malformed clustering job: ${parsed.error.message}` };
  }

  const { id, vectors, metric, options } = parsed.data;
  try {
    const result = new Clusterer(options).cluster(vectors, { metric });
    return { id, type: 'result', result };
  } catch (error) {
    return {
      id,
      type: 'error',
      code: isLociError(error) ? error.code : 'COMPUTATION',
      message: errorMessage(error),
    };
  }
}

/** Main-thread side: narrow whatever the worker posted. */
export function parseClusterReply(message: unknown): ClusterReply {
  const parsed = ClusterReplySchema.safeParse(message);
  if (!parsed.success) {
    throw new ComputationError(`Malformed reply from clustering worker: ${parsed.error.message}`);
  }
  return parsed.data;
}

// Rebuild the error a worker reported so callers can still branch on its class
export function replyError(reply: Extract<ClusterReply, { type: 'error' }>): LociError {
  switch (reply.code) {
    case 'VALIDATION':
      return new ValidationError(reply.message);
    case 'NO_DATA':
      return new NoDataError(reply.message);
    case 'NOT_FOUND':
      return new NotFoundError(reply.message);
    case 'ALREADY_EXISTS':
      return new AlreadyExistsError(reply.message);
    case 'EMBEDDING':
      return new EmbeddingError(reply.message);
    default:
      return new ComputationError(reply.message);
  }
}
