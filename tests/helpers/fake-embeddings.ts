import { Embeddings } from '@langchain/core/embeddings';

export const FAKE_DIMENSIONS = 64;

function bucket(word: string): number {
  let hash = 0;
  for (const ch of word) {
    hash = (hash * 31 + ch.charCodeAt(0)) % 100_003;
  }
  return hash % FAKE_DIMENSIONS;
}

/**
 * Hashed bag-of-words vectors: texts sharing words land close together
 */
export class FakeEmbeddings extends Embeddings {
  documentCalls: string[][] = [];

  constructor() {
    super({});
  }

  static vector(text: string): number[] {
    const vec = new Array<number>(FAKE_DIMENSIONS).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      vec[bucket(word)] += 1;
    }
    return vec;
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    this.documentCalls.push(documents);
    return documents.map(doc => FakeEmbeddings.vector(doc));
  }

  async embedQuery(query: string): Promise<number[]> {
    return FakeEmbeddings.vector(query);
  }
}
