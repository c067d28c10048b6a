import { ClusterStrategy, NearestNeighborStrategy } from './algorithms/strategies';
import { RouteStrategy } from './types/algorithm';

/** Registry of route strategies by name */
export class StrategyFactory {
    private readonly strategies = new Map<string, () => RouteStrategy>();

    register(name: string, factory: () => RouteStrategy): this {
        this.strategies.set(name, factory);
        return this;
    }

    create(name: string): RouteStrategy {
        const factory = this.strategies.get(name);
        if (!factory) {
            throw new Error(`Unknown strategy: ${name}`);
        }
        return factory();
    }

    getAvailable(): ReadonlyArray<string> {
        return Array.from(this.strategies.keys());
    }
}

export const createDefaultStrategyFactory = (): StrategyFactory =>
    new StrategyFactory()
        .register('nearest-neighbor', () => new NearestNeighborStrategy())
        .register('cluster', () => new ClusterStrategy());

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should list and create the default strategies', () => {
        const factory = createDefaultStrategyFactory();

        expect(factory.getAvailable()).toEqual(['nearest-neighbor', 'cluster']);
        expect(factory.create('cluster')).toBeInstanceOf(ClusterStrategy);
        expect(factory.create('nearest-neighbor').name).toBe('nearest-neighbor');
    });

    test('should throw on unknown strategy', () => {
        expect(() => createDefaultStrategyFactory().create('savings')).toThrowError('Unknown strategy: savings');
    });
}
