/**
 * AlbumCollection — In-memory snapshot of the store, keyed by url.
 *
 * Iteration follows file order. Replacing an album keeps its position;
 * new albums are appended.
 */

import type { Album } from '../types/album.js';

export class AlbumCollection implements Iterable<Album> {
  private readonly byUrl = new Map<string, Album>();

  constructor(albums: Iterable<Album> = []) {
    for (const album of albums) {
      this.set(album);
    }
  }

  get size(): number {
    return this.byUrl.size;
  }

  get(url: string): Album | undefined {
    return this.byUrl.get(url);
  }

  has(url: string): boolean {
    return this.byUrl.has(url);
  }

  findById(id: string): Album | undefined {
    for (const album of this.byUrl.values()) {
      if (album.id === id) {
        return album;
      }
    }
    return undefined;
  }

  /**
   * Insert or replace the album stored under its url.
   */
  set(album: Album): void {
    this.byUrl.set(album.url, album);
  }

  /**
   * Remove and return the album stored under a url.
   */
  delete(url: string): Album | undefined {
    const album = this.byUrl.get(url);
    if (album !== undefined) {
      this.byUrl.delete(url);
    }
    return album;
  }

  /**
   * Albums in store order.
   */
  values(): Album[] {
    return [...this.byUrl.values()];
  }

  [Symbol.iterator](): Iterator<Album> {
    return this.byUrl.values();
  }
}
