import { isAbsolute, join } from 'path';

export interface CatalogConfig {
    seedPath: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CatalogConfig {
    const seedPath = env.SEED_PATH || join('data', 'seed-movies.json');

    return {
        seedPath: isAbsolute(seedPath) ? seedPath : join(process.cwd(), seedPath),
    };
}
