import { OpenAI } from 'openai';
import { loadAppConfig } from '../config/app.config';
import { EmbeddingService } from './embedding.service';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  OpenAI: jest.fn().mockImplementation(() => ({ embeddings: { create: mockCreate } })),
}));

function serviceWith(env: Record<string, string>): EmbeddingService {
  return new EmbeddingService(
    loadAppConfig({ BEARER_TOKEN: 'test-secret', PINECONE_INDEX: 'docs', OPENAI_API_KEY: 'test-key', ...env }),
  );
}

describe('EmbeddingService', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    // Answer in reverse index order, as the API is free to do.
    mockCreate.mockImplementation(async ({ input }: { input: string[] }) => ({
      data: input.map((text, index) => ({ index, embedding: [text.length, index] })).reverse(),
    }));
  });

  it('creates the client from the configured key', () => {
    serviceWith({});

    expect(jest.mocked(OpenAI)).toHaveBeenLastCalledWith({ apiKey: 'test-key', baseURL: undefined });
  });

  it('sends inputs in batches of the configured size', async () => {
    await serviceWith({ EMBEDDINGS_BATCH_SIZE: '2' }).embed(['a', 'bb', 'ccc']);

    expect(mockCreate).toHaveBeenCalledTimes(2);
    expect(mockCreate).toHaveBeenNthCalledWith(1, { model: 'text-embedding-ada-002', input: ['a', 'bb'] });
    expect(mockCreate).toHaveBeenNthCalledWith(2, { model: 'text-embedding-ada-002', input: ['ccc'] });
  });

  it('puts the vectors back in input order', async () => {
    const vectors = await serviceWith({ EMBEDDINGS_BATCH_SIZE: '2' }).embed(['a', 'bb', 'ccc']);

    expect(vectors).toEqual([
      [1, 0],
      [2, 1],
      [3, 0],
    ]);
  });

  it('requests the configured dimension from text-embedding-3 models', async () => {
    await serviceWith({ EMBEDDING_MODEL: 'text-embedding-3-small', EMBEDDING_DIMENSION: '256' }).embed(['hello']);

    expect(mockCreate).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['hello'], dimensions: 256 });
  });

  it('leaves the dimension to older models', async () => {
    await serviceWith({ EMBEDDING_DIMENSION: '256' }).embed(['hello']);

    expect(mockCreate.mock.calls[0][0]).not.toHaveProperty('dimensions');
  });

  it('makes no request for no inputs', async () => {
    await expect(serviceWith({}).embed([])).resolves.toEqual([]);
    expect(mockCreate).not.toHaveBeenCalled();
  });
});
