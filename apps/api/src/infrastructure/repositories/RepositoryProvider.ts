export type RConstructor<T> = abstract new (...args: never[]) => T;

export abstract class RepositoryProvider {
    abstract get<T>(repositoryType: RConstructor<T>): T;
}

export class MilvusRepositoryProvider extends RepositoryProvider {
    private cache = new Map<RConstructor<unknown>, unknown>();
    private factories = new Map<RConstructor<unknown>, () => unknown>();

    register<T>(
        abstraction: RConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(abstraction, factory);
    }

    get<T>(repositoryType: RConstructor<T>): T {
        if (!this.cache.has(repositoryType)) {
            const factory = this.factories.get(repositoryType);

            if (!factory) {
                throw new Error(
                    `Repository ${repositoryType.name} not registered`
                );
            }

            this.cache.set(repositoryType, factory());
        }

        // keyed by the abstraction the factory was registered for
        return this.cache.get(repositoryType) as T;
    }
}
