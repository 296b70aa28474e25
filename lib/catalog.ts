import { loadConfig, type CatalogConfig } from './config';
import { MovieStore } from './movies';
import { createMovieQueries, type MovieQueries } from './queries';
import { readSeedFile, type SeedEntry } from './seed';

export interface Catalog {
    store: MovieStore;
    queries: MovieQueries;
}

declare global {
    // Shared by every module graph in the process (instrumentation and route bundles)
    var __movieCatalog: Catalog | undefined;
}

/**
 * Loads the seed and returns a catalog ready to serve.
 * Throws `StartupFailure` when the seed cannot be loaded.
 */
export function createCatalog(config: CatalogConfig, seed?: readonly SeedEntry[]): Catalog {
    const store = new MovieStore();
    store.load(seed ?? readSeedFile(config.seedPath));

    console.log(`[catalog] Loaded ${store.all().length} movie(s)`);
    return { store, queries: createMovieQueries(store) };
}

// Route modules call this at import time, so no handler exists before the seed is loaded.
export function getCatalog(): Catalog {
    if (!globalThis.__movieCatalog) {
        globalThis.__movieCatalog = createCatalog(loadConfig());
    }
    return globalThis.__movieCatalog;
}
