import { EmbeddingUnavailableError } from "../domain/errors.js";
import { RetrievedChunk } from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { VectorIndex } from "../infra/store/vectorIndex.js";
import { CollectionSource } from "../services/collectionManager.js";
import { cosineSimilarity } from "../utils/vector.js";

export type RetrievalStrategy = "similarity" | "mmr";

export interface RetrieverOptions {
  fetchK: number;
  strategy: RetrievalStrategy;
  mmrLambda: number;
}

export interface RetrievalResult {
  collectionFound: boolean;
  version: number;
  hits: RetrievedChunk[];
}

export class Retriever {
  constructor(
    private readonly collections: CollectionSource,
    private readonly embeddingClient: EmbeddingClient,
    private readonly options: RetrieverOptions,
  ) {}

  async retrieve(
    collectionId: string,
    queryText: string,
    k: number,
    scoreThreshold: number,
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    const handle = await this.collections.open(collectionId, signal);
    if (!handle.exists) {
      return { collectionFound: false, version: 0, hits: [] };
    }
    if (handle.index.size === 0 || k <= 0) {
      return { collectionFound: true, version: handle.version, hits: [] };
    }

    const [queryVector] = await this.embeddingClient.embed([queryText], signal);
    if (!queryVector) {
      throw new EmbeddingUnavailableError("Embedding service returned no query vector.", false);
    }

    const candidates = handle.index
      .search(queryVector, Math.max(k, this.options.fetchK))
      .filter((hit) => hit.score >= scoreThreshold)
      .flatMap((hit): RetrievedChunk[] => {
        const chunk = handle.index.getChunk(hit.chunkId);
        return chunk ? [{ chunk, score: hit.score }] : [];
      });

    const hits =
      this.options.strategy === "mmr"
        ? selectByMarginalRelevance(handle.index, queryVector, candidates, k, this.options.mmrLambda)
        : candidates.slice(0, k);

    return { collectionFound: true, version: handle.version, hits };
  }
}

/**
 * Greedy maximal marginal relevance over already ranked candidates.
 * `lambda` 1 is pure similarity, 0 is pure diversity. Ties keep candidate order.
 */
export function selectByMarginalRelevance(
  index: VectorIndex,
  queryVector: readonly number[],
  candidates: RetrievedChunk[],
  k: number,
  lambda: number,
): RetrievedChunk[] {
  const remaining = candidates.flatMap((candidate) => {
    const vector = index.getVector(candidate.chunk.chunkId);
    return vector ? [{ candidate, vector }] : [];
  });
  const selected: typeof remaining = [];

  while (selected.length < k && remaining.length > 0) {
    let bestPosition = 0;
    let bestScore = Number.NEGATIVE_INFINITY;

    remaining.forEach((entry, position) => {
      const relevance = cosineSimilarity(queryVector, entry.vector);
      const redundancy = selected.reduce(
        (max, chosen) => Math.max(max, cosineSimilarity(entry.vector, chosen.vector)),
        0,
      );
      const score = lambda * relevance - (1 - lambda) * redundancy;
      if (score > bestScore) {
        bestScore = score;
        bestPosition = position;
      }
    });

    selected.push(...remaining.splice(bestPosition, 1));
  }

  return selected.map((entry) => entry.candidate);
}
