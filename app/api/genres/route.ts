import { getCatalog } from '@/lib/catalog';
import { genresHandler } from '@/lib/handlers';

export const GET = genresHandler(getCatalog().queries);
