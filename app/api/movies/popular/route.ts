import { getCatalog } from '@/lib/catalog';
import { popularMoviesHandler } from '@/lib/handlers';

export const GET = popularMoviesHandler(getCatalog().queries);
