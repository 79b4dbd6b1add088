export interface EmbeddingProvider {
    /** Length of every vector returned by `embed`. */
    readonly dimension: number;

    /**
     * Embeds a batch of texts. Vectors come back in input order.
     * Fails with ProviderTransientError on faults worth retrying and ProviderError otherwise.
     */
    embed(texts: string[]): Promise<number[][]>;
}
