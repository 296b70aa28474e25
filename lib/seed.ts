import { readFileSync } from 'fs';
import { z } from 'zod';
import { StartupFailure } from './errors';

const seedEntrySchema = z.object({
    title: z.string().min(1, 'must be a non-empty string'),
    genre: z.string().min(1, 'must be a non-empty string'),
    isPopular: z.boolean(),
});

export type SeedEntry = z.infer<typeof seedEntrySchema>;

const seedSchema = z.array(seedEntrySchema);

export function parseSeed(value: unknown): SeedEntry[] {
    const result = seedSchema.safeParse(value);
    if (result.success) {
        return result.data;
    }

    const issue = result.error.issues[0];
    const [index, field] = issue.path;
    if (typeof index === 'number') {
        throw new StartupFailure(`Invalid seed entry #${index}: ${String(field ?? 'entry')} ${issue.message}`);
    }
    throw new StartupFailure(`Invalid seed: ${issue.message}`);
}

export function readSeedFile(path: string): SeedEntry[] {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new StartupFailure(`Cannot read seed file ${path}`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new StartupFailure(`Seed file ${path} is not valid JSON`, { cause: error });
    }

    return parseSeed(json);
}
