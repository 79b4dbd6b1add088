export interface PrepareOptions {
    dropExisting?: boolean;
}

export abstract class CollectionManager {
    abstract prepare(options?: PrepareOptions): Promise<void>;
    abstract finalize(): Promise<void>;
    abstract drop(): Promise<void>;
}
