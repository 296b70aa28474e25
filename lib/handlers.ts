import { NextRequest, NextResponse } from 'next/server';
import type { Movie, MovieStore } from './movies';
import type { MovieQueries } from './queries';

const CACHE_CONTROL = 'public, s-maxage=300, stale-while-revalidate=3600';

type MovieJson = Pick<Movie, 'id' | 'title' | 'genre' | 'isPopular'>;

export function toMovieJson(movie: Movie): MovieJson {
    return {
        id: movie.id,
        title: movie.title,
        genre: movie.genre,
        isPopular: movie.isPopular,
    };
}

function cached<T>(body: T): NextResponse<T> {
    const response = NextResponse.json(body);
    response.headers.set('Cache-Control', CACHE_CONTROL);
    return response;
}

function failure(context: string, error: unknown) {
    console.error(`[movies] ${context}:`, error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
}

// GET /api/movies/popular
export function popularMoviesHandler(queries: MovieQueries) {
    return async function GET() {
        try {
            return cached(queries.popularMovies().map(toMovieJson));
        } catch (error) {
            return failure('Popular movies query failed', error);
        }
    };
}

// GET /api/movies/genre/{genre}
export function moviesByGenreHandler(queries: MovieQueries) {
    return async function GET(
        _request: NextRequest,
        { params }: { params: Promise<{ genre: string }> }
    ) {
        const { genre } = await params;

        try {
            return cached(queries.moviesByGenre(genre).map(toMovieJson));
        } catch (error) {
            return failure(`Genre query failed for "${genre}"`, error);
        }
    };
}

// GET /api/genres
export function genresHandler(queries: MovieQueries) {
    return async function GET() {
        try {
            return cached(queries.genres());
        } catch (error) {
            return failure('Genre listing failed', error);
        }
    };
}

// GET /api/health
export function healthHandler(store: Pick<MovieStore, 'all'>) {
    return async function GET() {
        return NextResponse.json({ status: 'ok', movies: store.all().length });
    };
}
