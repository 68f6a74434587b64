import { NotFoundError } from '@cbt/shared';
import { NewsService } from '../news.service';
import { InMemoryNewsStore } from '../../__tests__/support/inMemoryStores';

describe('NewsService', () => {
  let store: InMemoryNewsStore;
  let service: NewsService;

  const publish = (title: string, date: string) =>
    service.create({ title, content: `${title} body`, url: 'https://news.example.com/item', date: new Date(date) });

  beforeEach(() => {
    store = new InMemoryNewsStore();
    service = new NewsService(store);
  });

  it('lists the newest items first', async () => {
    await publish('Registration opens', '2024-01-10T00:00:00.000Z');
    await publish('Results released', '2024-02-20T00:00:00.000Z');
    await publish('Timetable out', '2024-02-01T00:00:00.000Z');

    const items = await service.list(0, 2);

    expect(items.map((item) => item.title)).toEqual(['Results released', 'Timetable out']);
  });

  it('caps the page size at 100', async () => {
    const list = jest.spyOn(store, 'list');

    await service.list(5, 500);

    expect(list).toHaveBeenCalledWith(5, 100);
  });

  it('merges a partial update', async () => {
    const item = await publish('Registration opens', '2024-01-10T00:00:00.000Z');

    const updated = await service.update(item.id, { title: 'Registration extended' });

    expect(updated.title).toBe('Registration extended');
    expect(updated.content).toBe('Registration opens body');
  });

  it('reports missing items on read, update and delete', async () => {
    await expect(service.get(9)).rejects.toThrow(new NotFoundError('News item not found'));
    await expect(service.update(9, { title: 'x' })).rejects.toThrow(NotFoundError);
    await expect(service.delete(9)).rejects.toThrow(NotFoundError);
  });

  it('deletes an item', async () => {
    const item = await publish('Registration opens', '2024-01-10T00:00:00.000Z');

    await service.delete(item.id);

    expect(await store.findById(item.id)).toBeNull();
  });
});
