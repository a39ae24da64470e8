import { ModelCatalog, getFallbackModels } from './model-catalog';
import { FetchGateway } from './fetch-gateway';
import { FatalError } from './gateway-error';
import { ModelCatalogSource } from '../types/sources';

describe('ModelCatalog', () => {
  let now: number;
  let source: jest.Mocked<ModelCatalogSource>;
  let catalog: ModelCatalog;

  beforeEach(() => {
    now = 1_000_000;
    source = { listModels: jest.fn() };
    const gateway = new FetchGateway({ sleep: async () => undefined, random: () => 0, clock: () => now });
    catalog = new ModelCatalog(source, gateway, { cacheTtlMs: 60000, clock: () => now });
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('caches listings until the TTL expires', async () => {
    source.listModels.mockResolvedValue([{ id: 'llama-3.1-8b-instant', name: 'Llama 3.1 8B', enabled: true }]);

    await catalog.listModels('groq');
    await catalog.listModels('groq');
    expect(source.listModels).toHaveBeenCalledTimes(1);

    now += 60000;
    await catalog.listModels('groq');
    expect(source.listModels).toHaveBeenCalledTimes(2);
  });

  it('returns the fallback list when the provider fails', async () => {
    source.listModels.mockRejectedValue(new FatalError('invalid api key'));

    const models = await catalog.listModels('groq');

    expect(models).toEqual(getFallbackModels('groq'));
    expect(models[0]).toEqual({ id: 'llama-3.3-70b-versatile', name: 'llama-3.3-70b-versatile', enabled: true });
  });

  it('prefers a stale cache over the fallback list', async () => {
    const listing = [{ id: 'custom-model', name: 'Custom', enabled: true }];
    source.listModels.mockResolvedValueOnce(listing).mockRejectedValue(new FatalError('unauthorized'));

    await catalog.listModels('openrouter');
    now += 60000;

    await expect(catalog.listModels('openrouter')).resolves.toEqual(listing);
  });

  it('checks model membership', async () => {
    source.listModels.mockResolvedValue([{ id: 'gemma2-9b-it', name: 'Gemma 2', enabled: true }]);

    await expect(catalog.isKnownModel('groq', 'gemma2-9b-it')).resolves.toBe(true);
    await expect(catalog.isKnownModel('groq', 'unknown-model')).resolves.toBe(false);
  });

  it('refetches after the cache is cleared', async () => {
    source.listModels.mockResolvedValue([]);

    await catalog.listModels('groq');
    catalog.clearCache();
    await catalog.listModels('groq');

    expect(source.listModels).toHaveBeenCalledTimes(2);
  });
});
