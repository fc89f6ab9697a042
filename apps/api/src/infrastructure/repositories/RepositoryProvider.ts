export type RConstructor<T> = abstract new (...args: never[]) => T;

export abstract class RepositoryProvider {
    abstract get<T>(repositoryType: RConstructor<T>): T;
}

export class LazyRepositoryProvider extends RepositoryProvider {
    private cache = new Map<RConstructor<unknown>, unknown>();
    private factories = new Map<RConstructor<unknown>, () => unknown>();

    register<T>(
        abstraction: RConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(abstraction, factory);
        this.cache.delete(abstraction);
    }

    get<T>(repositoryType: RConstructor<T>): T {
        const cached = this.cache.get(repositoryType);
        if (cached instanceof repositoryType) {
            return cached;
        }

        const factory = this.factories.get(repositoryType);
        if (!factory) {
            throw new Error(
                `${repositoryType.name} not registered`
            );
        }

        const repository = factory();
        if (!(repository instanceof repositoryType)) {
            throw new Error(
                `Factory for ${repositoryType.name} returned an instance of another type`
            );
        }

        this.cache.set(repositoryType, repository);
        return repository;
    }
}
