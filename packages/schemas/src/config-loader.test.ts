import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadConfig } from './config-loader.js';
import { ConfigurationError } from '@crosscheck/shared/src/utils/errors.js';
import { SchemaValidationError } from '@crosscheck/shared/src/utils/errors.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const validSettings = {
  gateway: { callTimeoutMs: 5000 },
  sources: {
    'ledger-news': { ttlSeconds: 900, rateLimit: { capacity: 5, refillPerSecond: 1 } },
  },
};

const validRegistry = {
  entities: [
    { id: 'Q7184', label: 'NATO', names: ['nato'], kind: 'organization', canonicalId: 'Q7184' },
  ],
};

const validLexicon = {
  countries: ['france', 'germany'],
  vesselKeywords: ['tanker'],
};

const validFixtures = {
  sources: [
    {
      id: 'ledger-news',
      displayName: 'Ledger News',
      qualityTier: 'medium',
      domains: ['news'],
      responses: { nato: [{ subject: 'nato', title: 'Summit opens' }] },
    },
  ],
};

function mockFiles(files: Record<string, unknown>): Promise<void> {
  return import('node:fs/promises').then(({ readFile }) => {
    vi.mocked(readFile).mockImplementation((path: unknown) => {
      const filePath = String(path);
      for (const [name, content] of Object.entries(files)) {
        if (filePath.endsWith(name)) {
          return Promise.resolve(typeof content === 'string' ? content : JSON.stringify(content));
        }
      }
      return Promise.reject(new Error(`Unexpected file: ${filePath}`));
    });
  });
}

const allValid = {
  'crosscheck.json': validSettings,
  'entities.json': validRegistry,
  'lexicon.json': validLexicon,
  'sources.json': validFixtures,
};

describe('loadConfig', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should load and default all configuration files', async () => {
    await mockFiles(allValid);

    const config = await loadConfig('/test/config');
    expect(config.settings.gateway.callTimeoutMs).toBe(5000);
    expect(config.settings.gateway.retry.maxAttempts).toBe(3);
    expect(config.settings.sources['ledger-news']?.ttlSeconds).toBe(900);
    expect(config.registry.entities).toHaveLength(1);
    expect(config.lexicon.countries).toEqual(['france', 'germany']);
    expect(config.lexicon.personKeywords).toEqual([]);
    expect(config.fixtures.sources[0]?.healthy).toBe(true);
  });

  it('should throw ConfigurationError for missing files', async () => {
    const { readFile } = await import('node:fs/promises');
    const mockReadFile = vi.mocked(readFile);
    const error = new Error('File not found') as NodeJS.ErrnoException;
    error.code = 'ENOENT';
    mockReadFile.mockRejectedValue(error);

    await expect(loadConfig('/nonexistent')).rejects.toThrow(ConfigurationError);
  });

  it('should throw ConfigurationError for invalid JSON', async () => {
    await mockFiles({ ...allValid, 'lexicon.json': 'not valid json{{{' });

    await expect(loadConfig('/test/config')).rejects.toThrow(ConfigurationError);
  });

  it('should throw SchemaValidationError for an invalid settings file', async () => {
    await mockFiles({ ...allValid, 'crosscheck.json': { gateway: { callTimeoutMs: -1 } } });

    await expect(loadConfig('/test/config')).rejects.toThrow(SchemaValidationError);
  });

  it('should throw SchemaValidationError for duplicate fixture sources', async () => {
    await mockFiles({
      ...allValid,
      'sources.json': { sources: [validFixtures.sources[0], validFixtures.sources[0]] },
    });

    await expect(loadConfig('/test/config')).rejects.toThrow(SchemaValidationError);
  });
});
