import type { Movie, MovieStore } from './movies';

export interface GenreCount {
    genre: string;
    count: number;
}

export interface MovieQueries {
    popularMovies(): Movie[];
    moviesByGenre(genre: string): Movie[];
    genres(): GenreCount[];
}

export function createMovieQueries(store: Pick<MovieStore, 'all'>): MovieQueries {
    return {
        popularMovies() {
            return store.all().filter(movie => movie.isPopular);
        },

        moviesByGenre(genre) {
            if (!genre) return [];
            return store.all().filter(movie => movie.genre === genre);
        },

        // Distinct genres, in order of first appearance
        genres() {
            const counts = new Map<string, number>();
            for (const movie of store.all()) {
                counts.set(movie.genre, (counts.get(movie.genre) ?? 0) + 1);
            }
            return Array.from(counts, ([genre, count]) => ({ genre, count }));
        },
    };
}
