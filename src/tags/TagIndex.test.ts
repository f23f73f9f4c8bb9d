/**
 * Tests for tag counting, filtering and toggling.
 */

import { describe, it, expect } from 'vitest';
import { allTags, filterTags, toggle, tagMenu } from './TagIndex.js';
import type { Album } from '../types/album.js';

function album(id: string, tags: string[]): Album {
  return { id, url: `https://photos.example/${id}`, title: `Album ${id}`, tags };
}

const albums = [
  album('1', ['zoo', 'Beach', 'family']),
  album('2', ['beach', 'family']),
  album('3', ['family', 'zoo']),
  album('4', ['apple']),
];

describe('allTags', () => {
  it('orders listings by count then name', () => {
    expect(allTags(albums)).toEqual([
      { tag: 'family', count: 3 },
      { tag: 'zoo', count: 2 },
      { tag: 'apple', count: 1 },
      { tag: 'Beach', count: 1 },
      { tag: 'beach', count: 1 },
    ]);
  });

  it('orders menus by count with first-appearance ties', () => {
    expect(allTags(albums, 'menu').map(t => t.tag)).toEqual(['family', 'zoo', 'Beach', 'beach', 'apple']);
  });

  it('returns nothing for untagged albums', () => {
    expect(allTags([album('x', [])])).toEqual([]);
  });
});

describe('filterTags', () => {
  it('matches substrings case-insensitively', () => {
    expect(filterTags(allTags(albums), 'BEA').map(t => t.tag)).toEqual(['Beach', 'beach']);
  });

  it('keeps everything without a filter', () => {
    expect(filterTags(allTags(albums), '  ')).toHaveLength(5);
    expect(filterTags(allTags(albums))).toHaveLength(5);
  });
});

describe('toggle', () => {
  it('adds a missing tag once', () => {
    const first = toggle(album('a', ['x']), 'y', 'add');
    const second = toggle(first.album, 'y', 'add');

    expect(first.outcome).toBe('applied');
    expect(first.album.tags).toEqual(['x', 'y']);
    expect(second.outcome).toBe('already-in-that-state');
    expect(second.album.tags).toEqual(['x', 'y']);
  });

  it('removes a present tag once', () => {
    const first = toggle(album('a', ['x', 'y']), 'x', 'remove');
    const second = toggle(first.album, 'x', 'remove');

    expect(first.outcome).toBe('applied');
    expect(first.album.tags).toEqual(['y']);
    expect(second.outcome).toBe('already-in-that-state');
  });

  it('does not modify the input album', () => {
    const original = album('a', ['x']);
    toggle(original, 'y', 'add');
    expect(original.tags).toEqual(['x']);
  });
});

describe('tagMenu', () => {
  const target = album('2', ['beach', 'family']);

  it('marks each tag as add or remove', () => {
    const menu = tagMenu(albums, target);

    expect(menu.currentTags).toEqual(['beach', 'family']);
    expect(menu.entries.map(e => `${e.action}:${e.tag}`)).toEqual([
      'remove:family',
      'add:zoo',
      'add:Beach',
      'remove:beach',
      'add:apple',
    ]);
  });

  it('suggests a new lower-cased tag for unknown filter text', () => {
    const menu = tagMenu(albums, target, '  Hiking ');

    expect(menu.entries).toEqual([{ tag: 'hiking', count: 0, action: 'add', isNew: true }]);
  });

  it('does not suggest a tag that already exists', () => {
    const menu = tagMenu(albums, target, 'ZOO');

    expect(menu.entries).toEqual([{ tag: 'zoo', count: 2, action: 'add', isNew: false }]);
  });

  it('suggests a new tag alongside partial matches', () => {
    const menu = tagMenu(albums, target, 'fam');

    expect(menu.entries.map(e => e.tag)).toEqual(['family', 'fam']);
  });
});
