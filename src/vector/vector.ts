export function float32ArrayToBuffer(v: Float32Array): Buffer {
  return Buffer.from(v.buffer.slice(v.byteOffset, v.byteOffset + v.byteLength));
}

export function bufferToFloat32Array(buf: Buffer): Float32Array {
  const ab = buf.buffer.slice(buf.byteOffset, buf.byteOffset + buf.byteLength);
  return new Float32Array(ab);
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const av = a[i]!;
    const bv = b[i]!;
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  if (denom === 0) return 0;
  return dot / denom;
}

export function l2Normalize(v: Float32Array): Float32Array {
  let norm = 0;
  for (let i = 0; i < v.length; i++) norm += v[i]! * v[i]!;
  norm = Math.sqrt(norm);
  if (norm === 0) return v;
  const out = new Float32Array(v.length);
  for (let i = 0; i < v.length; i++) out[i] = v[i]! / norm;
  return out;
}

/** Mean of the input vectors; undefined when there are none. */
export function centroid(vectors: Float32Array[]): Float32Array | undefined {
  const first = vectors[0];
  if (!first) return undefined;
  const out = new Float32Array(first.length);
  for (const v of vectors) {
    if (v.length !== out.length) throw new Error(`Vector length mismatch: ${v.length} vs ${out.length}`);
    for (let i = 0; i < v.length; i++) out[i] = out[i]! + v[i]!;
  }
  for (let i = 0; i < out.length; i++) out[i] = out[i]! / vectors.length;
  return out;
}

export type Scored<T> = { item: T; score: number; tieKey: number };

/** Descending score; equal scores fall back to ascending tieKey so results are stable. */
export function compareScored<T>(a: Scored<T>, b: Scored<T>): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.tieKey - b.tieKey;
}

export function pushTopK<T>(arr: Scored<T>[], k: number, entry: Scored<T>): void {
  if (arr.length < k) {
    arr.push(entry);
    return;
  }
  let worstIdx = 0;
  for (let i = 1; i < arr.length; i++) {
    if (compareScored(arr[i]!, arr[worstIdx]!) > 0) worstIdx = i;
  }
  if (compareScored(entry, arr[worstIdx]!) < 0) arr[worstIdx] = entry;
}
