import { ValidationError } from '../errors.js';
import type { Distance } from './types.js';

export function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(a: Float32Array): number {
  return Math.sqrt(dot(a, a));
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/** Zero vectors are returned unchanged. */
export function l2Normalize(a: Float32Array): Float32Array {
  const n = norm(a);
  if (n === 0) return Float32Array.from(a);
  const out = new Float32Array(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] / n;
  }
  return out;
}

export function similarity(distance: Distance, a: Float32Array, b: Float32Array): number {
  switch (distance) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'dot':
      return dot(a, b);
    case 'euclidean':
      return 1 / (1 + euclideanDistance(a, b));
  }
}

export function assertDimension(vector: Float32Array, dimension: number, context: string): void {
  if (vector.length !== dimension) {
    throw new ValidationError(
      `Vector dimension ${vector.length} does not match collection dimension ${dimension} (${context})`
    );
  }
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) {
      throw new ValidationError(`Vector component ${i} is not finite (${context})`);
    }
  }
}

export function assertValidDimension(dimension: number): void {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new ValidationError(`Collection dimension must be a positive integer, got ${dimension}`);
  }
}

export function toBuffer(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

export function fromBuffer(buffer: Buffer, dimension: number): Float32Array {
  // Copy out: better-sqlite3 buffers are not guaranteed to be 4-byte aligned
  const copy = new Float32Array(dimension);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  for (let i = 0; i < dimension; i++) {
    copy[i] = view.getFloat32(i * 4, true);
  }
  return copy;
}
