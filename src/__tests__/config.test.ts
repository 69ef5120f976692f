import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let dir: string;

    function writeConfig(value: unknown): void {
        fs.writeFileSync(path.join(dir, 'genderscope.config.json'), JSON.stringify(value));
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'genderscope-config-'));
        vi.stubEnv('GENDERSCOPE_KB_ENDPOINT', '');
        vi.stubEnv('GENDERSCOPE_CONTACT', '');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('should use defaults without a config file', async () => {
        expect(await resolveConfig({}, { searchFrom: dir })).toEqual(DEFAULT_CONFIG);
    });

    it('should merge nested sections from the config file', async () => {
        writeConfig({ db: 'corpus.db', prn: { conflictPolicy: 'drop' }, knowledgeBase: { concurrency: 8 } });

        const config = await resolveConfig({}, { searchFrom: dir });

        expect(config.db).toBe('corpus.db');
        expect(config.prn).toEqual({ listPath: './data/prn_list.csv', conflictPolicy: 'drop' });
        expect(config.knowledgeBase.concurrency).toBe(8);
        expect(config.knowledgeBase.endpoint).toBe('https://query.wikidata.org/sparql');
    });

    it('should prefer flags over environment over file', async () => {
        writeConfig({ knowledgeBase: { contact: 'file@example.com', concurrency: 8, timeoutMs: 1000 } });
        vi.stubEnv('GENDERSCOPE_CONTACT', 'env@example.com');

        const config = await resolveConfig({ knowledgeBase: { concurrency: 2 } }, { searchFrom: dir });

        expect(config.knowledgeBase).toMatchObject({
            contact: 'env@example.com',
            concurrency: 2,
            timeoutMs: 1000,
        });
    });

    it('should reject invalid values with their key', async () => {
        writeConfig({ knowledgeBase: { concurrency: 0 } });

        await expect(resolveConfig({}, { searchFrom: dir })).rejects.toMatchObject({
            name: 'ConfigError',
            key: 'knowledgeBase.concurrency',
        });
    });

    it('should require a fixture path for the fixture provider', async () => {
        await expect(
            resolveConfig({ knowledgeBase: { provider: 'fixture' } }, { searchFrom: dir })
        ).rejects.toBeInstanceOf(ConfigError);
    });
});
