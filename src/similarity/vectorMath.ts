import { StorageCorruptEmbeddingError } from "../errors/storage.errors.js";

export function vectorNorm(values: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < values.length; i += 1) {
    const value = values[i] ?? 0;
    sum += value * value;
  }
  return Math.sqrt(sum);
}

// Zero vectors stay zero; every similarity against them is 0.
export function normalizeVector(values: ArrayLike<number>): Float32Array {
  const norm = vectorNorm(values);
  const normalized = new Float32Array(values.length);
  if (norm === 0 || !Number.isFinite(norm)) return normalized;
  for (let i = 0; i < values.length; i += 1) {
    normalized[i] = (values[i] ?? 0) / norm;
  }
  return normalized;
}

export function dotProduct(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
  }
  return dot;
}

export function vectorToBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

export function blobToVector(fragmentId: string, buffer: Buffer): Float32Array {
  if (buffer.byteLength % Float32Array.BYTES_PER_ELEMENT !== 0) {
    throw new StorageCorruptEmbeddingError(fragmentId, buffer.byteLength);
  }
  const slice = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
  return new Float32Array(slice);
}
