export interface InsertPayload {
    idField: string;
    vectorField: string;
    textField: string;
    ids: string[];
    vectors: number[][];
    texts: string[];
}

export interface IndexSpec {
    field: string;
    indexType: string;
    metricType: string;
    params: Record<string, number | string>;
}

export interface SearchRequest {
    vectors: number[][];
    field: string;
    metricType: string;
    params: Record<string, number | string>;
    limit: number;
    outputFields: string[];
}

export interface SearchHit {
    id: string;
    score: number;
    text: string;
    fields: Record<string, unknown>;
}

export abstract class VectorStore {
    /**
     * Inserts one batch and resolves with the number of entities stored
     */
    abstract insert(payload: InsertPayload): Promise<number>;
    abstract createIndex(spec: IndexSpec): Promise<void>;
    /**
     * Returns ranked hits for each query vector, in query order
     */
    abstract search(request: SearchRequest): Promise<SearchHit[][]>;
}
