import { StartupFailure } from './errors';
import { parseSeed, type SeedEntry } from './seed';

export interface Movie {
    id: number;
    title: string;
    genre: string;
    isPopular: boolean;
}

/**
 * Ordered, load-once collection of movies.
 *
 * Ids are assigned from 1 in seed order. After {@link MovieStore.load} the
 * store only serves reads.
 */
export class MovieStore {
    private movies: readonly Readonly<Movie>[] = [];
    private loaded = false;

    load(seed: readonly SeedEntry[]): void {
        if (this.loaded) {
            throw new StartupFailure('Movie store is already loaded');
        }

        const entries = parseSeed(seed);
        this.movies = Object.freeze(
            entries.map((entry, index) => Object.freeze({
                id: index + 1,
                title: entry.title,
                genre: entry.genre,
                isPopular: entry.isPopular,
            }))
        );
        this.loaded = true;
    }

    isLoaded(): boolean {
        return this.loaded;
    }

    all(): Movie[] {
        return this.movies.map(movie => ({ ...movie }));
    }
}
