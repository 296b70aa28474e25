import { getCatalog } from '@/lib/catalog';
import { healthHandler } from '@/lib/handlers';

export const GET = healthHandler(getCatalog().store);
