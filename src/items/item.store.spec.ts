import { ItemStore, SHARD_COUNT } from './item.store';

describe('ItemStore', () => {
  let store: ItemStore;

  beforeEach(() => {
    store = new ItemStore();
  });

  it('makes an inserted item visible to get', () => {
    expect(store.insert({ id: 1, name: 'esgrove' })).toEqual({ ok: true, item: { id: 1, name: 'esgrove' } });
    expect(store.get('esgrove')).toEqual({ id: 1, name: 'esgrove' });
  });

  it('rejects a second insert with the same name without overwriting', () => {
    store.insert({ id: 1, name: 'esgrove' });
    expect(store.insert({ id: 2, name: 'esgrove' })).toEqual({ ok: false, reason: 'duplicate-name' });
    expect(store.get('esgrove')).toEqual({ id: 1, name: 'esgrove' });
    expect(store.size).toBe(1);
  });

  it('compares names case-sensitively', () => {
    store.insert({ id: 1, name: 'esgrove' });
    expect(store.insert({ id: 2, name: 'Esgrove' }).ok).toBe(true);
    expect(store.size).toBe(2);
  });

  it('rejects an id that is already in use', () => {
    store.insert({ id: 1234, name: 'first' });
    expect(store.insert({ id: 1234, name: 'second' })).toEqual({ ok: false, reason: 'duplicate-id' });
    expect(store.get('second')).toBeUndefined();
  });

  it('returns copies that cannot mutate stored items', () => {
    store.insert({ id: 1, name: 'esgrove' });
    const copy = store.get('esgrove');
    if (copy) copy.id = 99;
    expect(store.get('esgrove')).toEqual({ id: 1, name: 'esgrove' });
  });

  it('removes an item and frees its id', () => {
    store.insert({ id: 1234, name: 'esgrove' });
    expect(store.remove('esgrove')).toEqual({ id: 1234, name: 'esgrove' });
    expect(store.get('esgrove')).toBeUndefined();
    expect(store.hasId(1234)).toBe(false);
    expect(store.remove('esgrove')).toBeUndefined();
  });

  it('clears all items and reports how many were removed', () => {
    for (let i = 0; i < 40; i++) store.insert({ id: i + 1, name: `item-${i}` });
    expect(store.clear()).toBe(40);
    expect(store.list()).toEqual([]);
    expect(store.size).toBe(0);
    expect(store.clear()).toBe(0);
  });

  it('lists a snapshot sorted by name across shards', () => {
    const names = ['delta', 'alpha', 'charlie', 'bravo', 'echo'];
    names.forEach((name, index) => store.insert({ id: index + 1, name }));
    const listed = store.list();
    expect(listed.map((item) => item.name)).toEqual(['alpha', 'bravo', 'charlie', 'delta', 'echo']);
    store.insert({ id: 10, name: 'foxtrot' });
    expect(listed).toHaveLength(5);
  });

  it('spreads names over more than one shard', () => {
    for (let i = 0; i < SHARD_COUNT * 4; i++) store.insert({ id: i + 1, name: `name-${i}` });
    const shards: unknown = Reflect.get(store, 'shards');
    const used = Array.isArray(shards) ? shards.filter((shard: Map<string, unknown>) => shard.size > 0).length : 0;
    expect(used).toBeGreaterThan(1);
  });

  describe('nextId', () => {
    it('is monotonic and not reused after deletion', () => {
      const first = store.nextId();
      store.insert({ id: first, name: 'a' });
      store.remove('a');
      const second = store.nextId();
      expect(first).toBe(1);
      expect(second).toBe(2);
    });

    it('skips ids claimed by callers', () => {
      store.insert({ id: 1, name: 'a' });
      store.insert({ id: 2, name: 'b' });
      expect(store.nextId()).toBe(3);
    });

    it('hands out distinct ids to concurrent callers', async () => {
      const ids = await Promise.all(Array.from({ length: 200 }, async () => store.nextId()));
      expect(new Set(ids).size).toBe(200);
    });
  });

  it('lets exactly one of many concurrent inserts of one name win', async () => {
    const results = await Promise.all(
      Array.from({ length: 100 }, async (_, i) => store.insert({ id: i + 1, name: 'esgrove' })),
    );
    expect(results.filter((result) => result.ok)).toHaveLength(1);
    expect(results.filter((result) => !result.ok)).toHaveLength(99);
    expect(store.list()).toEqual([{ id: 1, name: 'esgrove' }]);
  });
});
