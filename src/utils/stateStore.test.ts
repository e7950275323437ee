import { afterEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import fs from 'fs-extra';
import { StateStore, normalizeDirectory } from './stateStore.js';
import { resolveStartPosition } from './startPosition.js';
import { getEvents } from './eventLog.js';
import { createTempTree } from '../test/tempTree.js';

describe('normalizeDirectory', () => {
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await cleanup?.();
    cleanup = undefined;
  });

  it('resolves symlinks to the real directory', async () => {
    const tree = await createTempTree(['real/a.jpg']);
    cleanup = tree.cleanup;
    await fs.symlink(tree.resolve('real'), tree.resolve('link'));

    const viaLink = await normalizeDirectory(tree.resolve('link'));
    expect(viaLink).toBe(await fs.realpath(tree.resolve('real')));
  });

  it('falls back to the absolute path for a missing directory', async () => {
    const missing = path.join('does-not-exist', 'photos');
    expect(await normalizeDirectory(missing)).toBe(path.resolve(missing));
  });
});

describe('StateStore', () => {
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await cleanup?.();
    cleanup = undefined;
  });

  it('loads an empty mapping when the file does not exist', async () => {
    const tree = await createTempTree();
    cleanup = tree.cleanup;

    const store = new StateStore(tree.resolve('state.json'));
    expect(await store.load()).toEqual({});
    expect(getEvents()).toEqual([]);
  });

  it('saves and reads back a directory position', async () => {
    const tree = await createTempTree(['photos/a.jpg']);
    cleanup = tree.cleanup;
    const store = new StateStore(tree.resolve('data', 'state.json'));
    const record = { last_image_path: tree.resolve('photos/a.jpg'), last_index: 0, image_count: 1 };

    expect(await store.save(tree.resolve('photos'), record)).toBe(true);
    expect(await store.get(tree.resolve('photos'))).toEqual(record);

    const key = await fs.realpath(tree.resolve('photos'));
    expect(await fs.readJson(tree.resolve('data', 'state.json'))).toEqual({ [key]: record });
  });

  it('preserves other directories on save', async () => {
    const tree = await createTempTree(['one/a.jpg', 'two/b.jpg']);
    cleanup = tree.cleanup;
    const store = new StateStore(tree.resolve('state.json'));

    await store.save(tree.resolve('one'), { last_image_path: tree.resolve('one/a.jpg'), last_index: 0 });
    await store.save(tree.resolve('two'), { last_image_path: tree.resolve('two/b.jpg'), last_index: 0 });
    await store.save(tree.resolve('one'), { last_image_path: tree.resolve('one/a.jpg'), last_index: 0, image_count: 1 });

    const states = await store.load();
    expect(Object.keys(states)).toHaveLength(2);
    expect(await store.get(tree.resolve('two'))).toEqual({
      last_image_path: tree.resolve('two/b.jpg'),
      last_index: 0,
    });
    expect((await store.get(tree.resolve('one')))?.image_count).toBe(1);
  });

  it('recognizes a directory reached through a symlink', async () => {
    const tree = await createTempTree(['real/a.jpg']);
    cleanup = tree.cleanup;
    await fs.symlink(tree.resolve('real'), tree.resolve('link'));
    const store = new StateStore(tree.resolve('state.json'));
    const record = { last_image_path: tree.resolve('real/a.jpg'), last_index: 0 };

    await store.save(tree.resolve('link'), record);
    expect(await store.get(tree.resolve('real'))).toEqual(record);
  });

  it('fails open on malformed JSON', async () => {
    const tree = await createTempTree({ 'state.json': 'not json' });
    cleanup = tree.cleanup;
    const showWarning = vi.fn();

    const store = new StateStore(tree.resolve('state.json'), { showWarning });
    expect(await store.load()).toEqual({});
    expect(showWarning).toHaveBeenCalledWith(
      'Saved slideshow positions could not be read. Starting from the beginning.'
    );
    expect(getEvents('warn').map(entry => entry.event)).toEqual(['state_load_failed']);
  });

  it('drops invalid entries but keeps valid ones', async () => {
    const tree = await createTempTree({
      'state.json': JSON.stringify({
        '/photos': { last_image_path: '/photos/a.jpg', last_index: 3 },
        '/broken': { last_image_path: 42, last_index: 0 },
      }),
    });
    cleanup = tree.cleanup;

    const store = new StateStore(tree.resolve('state.json'));
    expect(await store.load()).toEqual({
      '/photos': { last_image_path: '/photos/a.jpg', last_index: 3 },
    });
    const [rejected] = getEvents('warn');
    expect(rejected.event).toBe('state_entries_rejected');
    expect(rejected.payload?.rejectedKeys).toEqual(['/broken']);
  });

  it('reports write failures without throwing', async () => {
    const tree = await createTempTree({ blocker: 'file' });
    cleanup = tree.cleanup;
    const showError = vi.fn();
    const store = new StateStore(tree.resolve('blocker', 'state.json'), { showError });

    const saved = await store.save(tree.root, { last_image_path: '/p/a.jpg', last_index: 0 });

    expect(saved).toBe(false);
    expect(showError).toHaveBeenCalledTimes(1);
    expect(getEvents('error').map(entry => entry.event)).toEqual(['state_save_failed']);
  });

  it('round-trips a resume position for an unchanged list', async () => {
    const tree = await createTempTree(['photos/a.jpg', 'photos/b.jpg', 'photos/c.jpg']);
    cleanup = tree.cleanup;
    const images = ['a.jpg', 'b.jpg', 'c.jpg'].map(name => tree.resolve('photos', name));
    const store = new StateStore(tree.resolve('state.json'));

    await store.save(tree.resolve('photos'), {
      last_image_path: images[2],
      last_index: 2,
      image_count: images.length,
    });

    const savedState = await store.get(tree.resolve('photos'));
    expect(resolveStartPosition({ images, resume: true, savedState }).index).toBe(2);
  });
});
