import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { StartupFailure } from './errors';
import { parseSeed, readSeedFile } from './seed';

describe('parseSeed', () => {
    it('accepts well-formed entries', () => {
        const seed = parseSeed([{ title: 'Heat', genre: 'Crime', isPopular: true }]);
        expect(seed).toEqual([{ title: 'Heat', genre: 'Crime', isPopular: true }]);
    });

    it('drops unknown keys', () => {
        const seed = parseSeed([{ title: 'Heat', genre: 'Crime', isPopular: true, year: 1995 }]);
        expect(seed).toEqual([{ title: 'Heat', genre: 'Crime', isPopular: true }]);
    });

    it('names the entry and field that is missing', () => {
        expect(() => parseSeed([
            { title: 'Heat', genre: 'Crime', isPopular: true },
            { title: 'Alien', isPopular: true },
        ])).toThrow('Invalid seed entry #1: genre Required');
    });

    it('rejects an empty title', () => {
        expect(() => parseSeed([{ title: '', genre: 'Crime', isPopular: false }]))
            .toThrow('Invalid seed entry #0: title must be a non-empty string');
    });

    it('rejects a non-boolean popularity flag', () => {
        expect(() => parseSeed([{ title: 'Heat', genre: 'Crime', isPopular: 'yes' }]))
            .toThrow('Invalid seed entry #0: isPopular Expected boolean, received string');
    });

    it('rejects a seed that is not a list', () => {
        expect(() => parseSeed({ movies: [] })).toThrow(StartupFailure);
        expect(() => parseSeed({ movies: [] })).toThrow('Invalid seed: Expected array, received object');
    });
});

describe('readSeedFile', () => {
    let dir: string;

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), 'movie-seed-'));
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('reads the bundled seed list', () => {
        const seed = readSeedFile(join(process.cwd(), 'data', 'seed-movies.json'));

        expect(seed).toHaveLength(8);
        expect(seed[0]).toEqual({ title: 'The Shawshank Redemption', genre: 'Drama', isPopular: true });
        expect(seed[7]).toEqual({ title: 'Die Hard', genre: 'Action', isPopular: false });
    });

    it('fails on invalid JSON', () => {
        const path = join(dir, 'broken.json');
        writeFileSync(path, '[{ "title": ');

        expect(() => readSeedFile(path)).toThrow(`Seed file ${path} is not valid JSON`);
    });

    it('fails on a missing file', () => {
        const path = join(dir, 'missing.json');
        expect(() => readSeedFile(path)).toThrow(`Cannot read seed file ${path}`);
    });

    it('fails on a malformed entry', () => {
        const path = join(dir, 'malformed.json');
        writeFileSync(path, JSON.stringify([{ genre: 'Drama', isPopular: false }]));

        expect(() => readSeedFile(path)).toThrow('Invalid seed entry #0: title Required');
    });
});
