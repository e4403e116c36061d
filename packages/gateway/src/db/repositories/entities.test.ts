/**
 * EntitiesRepository Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FakeAdapter } from '../../test-helpers.js';
import { EntitiesRepository, fileUrl } from './entities.js';

const NODE_TYPE = {
  id: 'node',
  label: 'Content',
  bundle_entity_type: 'node_type',
  translatable: true,
  tracks_created: true,
  tracks_changed: true,
};

const USER_TYPE = {
  id: 'user',
  label: 'User',
  bundle_entity_type: null,
  translatable: false,
  tracks_created: true,
  tracks_changed: false,
};

function entityRow(id: string, overrides: Record<string, unknown> = {}) {
  return {
    entity_type: 'node',
    id,
    uuid: `00000000-0000-4000-8000-00000000000${id}`,
    bundle: 'article',
    langcode: 'en',
    label: `Node ${id}`,
    created: '1700000000',
    changed: 1700003600,
    ...overrides,
  };
}

function definition(name: string, type: string, overrides: Record<string, unknown> = {}) {
  return {
    bundle: 'article',
    name,
    label: name,
    type,
    required: false,
    cardinality: 1,
    computed: false,
    main_property: null,
    target_type: null,
    ...overrides,
  };
}

function typesHandler(params: unknown[]) {
  return [NODE_TYPE, USER_TYPE].filter((type) => type.id === params[0]);
}

describe('EntitiesRepository', () => {
  let adapter: FakeAdapter;
  let repo: EntitiesRepository;

  beforeEach(() => {
    adapter = new FakeAdapter()
      .on(/FROM entity_types/, typesHandler)
      .on(/FROM entities WHERE entity_type = \? AND id = \?/, (params) =>
        params[1] === '1' ? [entityRow('1', { label: 'Hello' })] : []
      )
      .on(/SELECT entity_type, id, uuid[\s\S]*id = ANY/, () => [entityRow('1'), entityRow('2')])
      .on(/SELECT id, label FROM entities/, [{ id: '5', label: 'News' }])
      .on(/FROM field_definitions/, [
        definition('title', 'string', { bundle: '', label: 'Title' }),
        definition('title', 'string', { label: 'Headline' }),
        definition('field_tags', 'entity_reference', { cardinality: -1, target_type: 'taxonomy_term' }),
        definition('field_image', 'image'),
      ])
      .on(/FROM entity_field_values/, (params) =>
        params[1] === '1'
          ? [
              { field_name: 'field_image', delta: 0, properties: { target_id: 3, alt: 'A cat' } },
              { field_name: 'field_tags', delta: 0, properties: { target_id: 5 } },
              { field_name: 'field_tags', delta: 1, properties: { target_id: '9' } },
              { field_name: 'title', delta: 0, properties: { value: 'Hello' } },
            ]
          : []
      )
      .on(/FROM files/, [
        { id: '3', filename: 'cat.jpg', uri: 'public://2024/cat.jpg', filemime: 'image/jpeg', filesize: '2048' },
      ])
      .on(/FROM entity_translations/, [{ langcode: 'de' }]);
    repo = new EntitiesRepository(adapter);
  });

  describe('load', () => {
    it('hydrates identity, timestamps and translations', async () => {
      const entity = await repo.load('node', '1');

      expect(entity).toMatchObject({
        entityType: 'node',
        id: '1',
        label: 'Hello',
        bundle: 'article',
        langcode: 'en',
        createdAt: 1700000000,
        changedAt: 1700003600,
        translations: ['en', 'de'],
      });
    });

    it('lets bundle fields override base fields of the same name', async () => {
      const entity = await repo.load('node', '1');

      expect(entity?.fields.map((field) => field.definition.name)).toEqual(['title', 'field_tags', 'field_image']);
      expect(entity?.fields[0]?.definition.label).toBe('Headline');
      expect(entity?.fields[0]?.items).toEqual([{ properties: { value: 'Hello' } }]);
    });

    it('resolves referenced entities and leaves unknown targets null', async () => {
      const entity = await repo.load('node', '1');
      const tags = entity?.fields.find((field) => field.definition.name === 'field_tags');

      expect(tags?.definition.cardinality).toBe(-1);
      expect(tags?.items).toEqual([
        { properties: { target_id: 5 }, target: { kind: 'entity', entityType: 'taxonomy_term', label: 'News' } },
        { properties: { target_id: '9' }, target: null },
      ]);
      expect(adapter.callsMatching(/SELECT id, label FROM entities/)[0]?.params).toEqual(['taxonomy_term', ['5', '9']]);
    });

    it('resolves files with a public url', async () => {
      const entity = await repo.load('node', '1');
      const image = entity?.fields.find((field) => field.definition.name === 'field_image');

      expect(image?.items[0]?.target).toEqual({
        kind: 'file',
        filename: 'cat.jpg',
        uri: 'public://2024/cat.jpg',
        url: '/sites/default/files/2024/cat.jpg',
        mime: 'image/jpeg',
        size: 2048,
      });
    });

    it('returns null for a missing entity or an unknown type', async () => {
      expect(await repo.load('node', '404')).toBeNull();
      expect(await repo.load('widget', '1')).toBeNull();
    });
  });

  describe('loadMany', () => {
    it('keeps the requested order and skips missing ids', async () => {
      const entities = await repo.loadMany('node', ['2', '404', '1']);
      expect(entities.map((entity) => entity.id)).toEqual(['2', '1']);
    });

    it('does not query for an empty id list', async () => {
      expect(await repo.loadMany('node', [])).toEqual([]);
      expect(adapter.calls).toHaveLength(0);
    });
  });

  describe('list', () => {
    it('filters by bundle and field conditions, newest first', async () => {
      const listAdapter = new FakeAdapter()
        .on(/FROM entity_types/, typesHandler)
        .on(/FROM entities e/, [entityRow('12'), entityRow('3')]);
      const listRepo = new EntitiesRepository(listAdapter);

      const summaries = await listRepo.list('node', {
        bundle: 'article',
        limit: 10,
        offset: 0,
        conditions: { status: true },
      });

      expect(summaries.map((summary) => summary.id)).toEqual(['12', '3']);
      const call = listAdapter.callsMatching(/FROM entities e/)[0];
      expect(call?.sql).toContain('ORDER BY LENGTH(e.id) DESC, e.id DESC');
      expect(call?.params).toEqual(['node', 'article', 'status', 'true', 'true', 10, 0]);
    });

    it('omits bundle and langcode for types without them', async () => {
      const listAdapter = new FakeAdapter()
        .on(/FROM entity_types/, typesHandler)
        .on(/FROM entities e/, [entityRow('7', { entity_type: 'user', bundle: null, langcode: null, label: 'admin' })]);
      const listRepo = new EntitiesRepository(listAdapter);

      const summaries = await listRepo.list('user', { bundle: null, limit: 50, offset: 0, conditions: {} });

      expect(summaries).toEqual([
        { entityType: 'user', id: '7', uuid: '00000000-0000-4000-8000-000000000007', label: 'admin' },
      ]);
      expect(listAdapter.callsMatching(/FROM entities e/)[0]?.params).toEqual(['user', 50, 0]);
    });
  });
});

describe('fileUrl', () => {
  it('maps stream wrappers to paths', () => {
    expect(fileUrl('public://a/b.png')).toBe('/sites/default/files/a/b.png');
    expect(fileUrl('public://a.png', 'https://cdn.test/files')).toBe('https://cdn.test/files/a.png');
    expect(fileUrl('private://report.pdf')).toBe('/system/files/report.pdf');
  });

  it('passes other uris through', () => {
    expect(fileUrl('https://example.com/a.png')).toBe('https://example.com/a.png');
    expect(fileUrl('relative/path.txt')).toBe('relative/path.txt');
  });
});
