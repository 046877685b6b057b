export type SparseVector = Map<number, number>;

// TF-IDF over already-normalized term frequencies + cosine similarity
export class TfIdf {
  private vocab = new Map<string, number>();
  private df = new Map<number, number>();
  private N = 0;

  fit(docs: Iterable<ReadonlyMap<string, number>>) {
    this.vocab.clear();
    this.df.clear();
    this.N = 0;
    for (const doc of docs) {
      this.N += 1;
      for (const term of doc.keys()) {
        let idx = this.vocab.get(term);
        if (idx === undefined) {
          idx = this.vocab.size;
          this.vocab.set(term, idx);
        }
        this.df.set(idx, (this.df.get(idx) || 0) + 1);
      }
    }
    return this;
  }

  // terms outside the fitted vocabulary are dropped
  vectorize(frequencies: ReadonlyMap<string, number>): SparseVector {
    const v: SparseVector = new Map();
    for (const [term, f] of frequencies) {
      const idx = this.vocab.get(term);
      if (idx === undefined || f <= 0) continue;
      const idf = Math.log((this.N + 1) / ((this.df.get(idx) || 0) + 1)) + 1;
      v.set(idx, f * idf);
    }
    return v;
  }

  cosine(a: SparseVector, b: SparseVector) {
    let dot = 0, na = 0, nb = 0;
    for (const [i, va] of a) {
      na += va * va;
      const vb = b.get(i);
      if (vb) dot += va * vb;
    }
    for (const [, vb] of b) nb += vb * vb;
    return dot / (Math.sqrt(na) * Math.sqrt(nb) || 1);
  }
}
