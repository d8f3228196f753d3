import { loadAppConfig } from '../config/app.config';
import { InMemoryDataStore } from '../../test/fakes/in-memory.datastore';
import { DataStore } from './datastore';
import { DatastoreService } from './datastore.service';

describe('DatastoreService', () => {
  const config = loadAppConfig({ BEARER_TOKEN: 'test-secret', PINECONE_INDEX: 'docs' });
  let build: jest.Mock<Promise<DataStore>, [string]>;
  let service: DatastoreService;

  beforeEach(() => {
    build = jest.fn<Promise<DataStore>, [string]>(async (name) => new InMemoryDataStore(name));
    service = new DatastoreService(config, build);
  });

  it('builds the default store on startup', async () => {
    await service.onModuleInit();

    expect(build).toHaveBeenCalledWith('docs');
    expect(service.defaultDatastore).toBeInstanceOf(InMemoryDataStore);
  });

  it('refuses to hand out the default store before startup', () => {
    expect(() => service.defaultDatastore).toThrow('The default datastore has not been initialized');
  });

  it('falls back to the default store for an empty name', async () => {
    const store = await service.getDatastore('  ');

    expect(build).toHaveBeenCalledWith('docs');
    expect(store).toBe(await service.getDatastore());
  });

  it('builds each named store once', async () => {
    const [first, second] = await Promise.all([service.getDatastore('notes'), service.getDatastore('notes')]);

    expect(first).toBe(second);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('forgets a failed build so the next request retries', async () => {
    build.mockRejectedValueOnce(new Error('qdrant unavailable'));

    await expect(service.getDatastore('notes')).rejects.toThrow('qdrant unavailable');
    await expect(service.getDatastore('notes')).resolves.toBeInstanceOf(InMemoryDataStore);
    expect(build).toHaveBeenCalledTimes(2);
  });
});
