/**
 * Paperwork labels → paperless-ngx tag ids
 *
 * Labels are matched against tag slugs after lowercasing. Labels with no
 * matching tag are dropped; tags are never created on the server.
 */

import type { TagMap } from './types.js';

export function buildTagMap(tags: Array<{ id: number; slug: string }>): TagMap {
  const map: TagMap = new Map();
  for (const tag of tags) {
    map.set(tag.slug.toLowerCase(), tag.id);
  }
  return map;
}

export function resolveTagIds(labels: string[], tagMap: TagMap): number[] {
  const ids: number[] = [];
  for (const label of labels) {
    const id = tagMap.get(label.toLowerCase());
    if (id !== undefined) {
      ids.push(id);
    }
  }
  return ids;
}
