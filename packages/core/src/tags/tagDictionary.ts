/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Structural category a user-declared tag is parsed as. */
export type TagCategory = 'inline' | 'block' | 'empty' | 'pre';

/**
 * Dictionary of tags declared through configuration. The HTML parser consults
 * it; the configuration engine only defines and frees entries.
 */
export interface TagDictionary {
  defineTag(category: TagCategory, name: string): void;
  /** Frees the tags of one category, or of every category when omitted. */
  freeDeclaredTags(category?: TagCategory): void;
}

/**
 * In-memory tag dictionary. A name belongs to one category at a time;
 * redefining it moves it.
 */
export class DeclaredTagDictionary implements TagDictionary {
  private readonly tags = new Map<string, TagCategory>();

  defineTag(category: TagCategory, name: string): void {
    this.tags.set(name, category);
  }

  freeDeclaredTags(category?: TagCategory): void {
    if (category === undefined) {
      this.tags.clear();
      return;
    }
    for (const [name, declared] of this.tags) {
      if (declared === category) {
        this.tags.delete(name);
      }
    }
  }

  lookup(name: string): TagCategory | undefined {
    return this.tags.get(name);
  }

  /** Names declared under a category, in declaration order. */
  getDeclaredTags(category: TagCategory): string[] {
    const names: string[] = [];
    for (const [name, declared] of this.tags) {
      if (declared === category) {
        names.push(name);
      }
    }
    return names;
  }

  get size(): number {
    return this.tags.size;
  }
}
