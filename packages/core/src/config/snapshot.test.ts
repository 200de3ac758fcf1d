/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { DeclaredTagDictionary } from '../tags/tagDictionary.js';
import { MarkupConfig } from './MarkupConfig.js';
import { OptionId } from './optionIds.js';
import { listOptions } from './optionRegistry.js';
import { DEFAULT_STRING, integerValue, stringValue } from './optionValues.js';
import { changedUserTagOptions } from './snapshot.js';

function quietConfig(tags = new DeclaredTagDictionary()): MarkupConfig {
  return new MarkupConfig({ tagDictionary: tags, reporter: { report() {} } });
}

describe('snapshots', () => {
  it('shows no differences on a fresh configuration', () => {
    const config = quietConfig();
    expect(config.diffFromSnapshot()).toBe(false);
    expect(config.diffFromDefault()).toBe(false);
  });

  it('returns to the defaults after any sequence of parses and a reset', () => {
    const names = listOptions().map((option) => option.name);
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.constantFrom(...names), fc.string()), {
          maxLength: 10,
        }),
        (assignments) => {
          const config = quietConfig();
          for (const [name, value] of assignments) {
            config.parseOption(name, value);
          }
          config.resetToDefault();
          expect(config.diffFromDefault()).toBe(false);
        },
      ),
    );
  });

  it('leaves every value and tag alone when nothing changed in between', () => {
    const tags = new DeclaredTagDictionary();
    const config = quietConfig(tags);
    config.parseOption('new-inline-tags', 'x, y');
    config.parseOption('new-pre-tags', 'listing');
    config.parseOption('doctype', '"-//W3C//DTD Custom//EN"');
    config.parseOption('wrap', '90');
    config.parseOption('tab-size', '4');

    config.takeSnapshot();
    const saved = [...config.store.values()];
    config.restoreSnapshot();

    expect(config.store.values()).toEqual(saved);
    expect(tags.getDeclaredTags('inline')).toEqual(['x', 'y']);
    expect(tags.getDeclaredTags('pre')).toEqual(['listing']);
    expect(config.getString(OptionId.Doctype)).toBe('-//W3C//DTD Custom//EN');
  });

  it('round-trips any sequence of parses through a snapshot', () => {
    const names = listOptions().map((option) => option.name);
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.constantFrom(...names), fc.string()), {
          maxLength: 10,
        }),
        (assignments) => {
          const config = quietConfig();
          for (const [name, value] of assignments) {
            config.parseOption(name, value);
          }
          config.takeSnapshot();
          const saved = [...config.store.values()];
          config.restoreSnapshot();
          expect(config.store.values()).toEqual(saved);
        },
      ),
    );
  });

  it('restores values changed after the snapshot', () => {
    const config = quietConfig();
    config.takeSnapshot();
    expect(config.diffFromSnapshot()).toBe(false);

    config.parseOption('wrap', '100');
    expect(config.diffFromSnapshot()).toBe(true);

    config.restoreSnapshot();
    expect(config.getInt(OptionId.Wrap)).toBe(68);
    expect(config.diffFromSnapshot()).toBe(false);
  });

  it('applies the consistency rules before saving', () => {
    const config = quietConfig();
    config.takeSnapshot();
    expect(config.getInt(OptionId.IndentSpaces)).toBe(0);
    expect(config.diffFromDefault()).toBe(true);
  });

  it('declares the saved tags again on restore', () => {
    const tags = new DeclaredTagDictionary();
    const config = quietConfig(tags);
    config.parseOption('new-inline-tags', 'x');
    config.takeSnapshot();

    config.parseOption('new-inline-tags', 'y');
    expect(tags.lookup('x')).toBeUndefined();
    expect(tags.lookup('y')).toBe('inline');

    config.restoreSnapshot();
    expect(config.getString(OptionId.InlineTags)).toBe('x');
    expect(tags.lookup('x')).toBe('inline');
    expect(tags.lookup('y')).toBeUndefined();
  });

  it('frees tags declared after a default snapshot', () => {
    const tags = new DeclaredTagDictionary();
    const config = quietConfig(tags);
    config.takeSnapshot();
    config.parseOption('new-empty-tags', 'z');
    expect(tags.lookup('z')).toBe('empty');

    config.restoreSnapshot();
    expect(config.getString(OptionId.EmptyTags)).toBeNull();
    expect(tags.size).toBe(0);
  });
});

describe('copyFrom', () => {
  it('copies values and tags, and keeps the previous state as snapshot', () => {
    const sourceTags = new DeclaredTagDictionary();
    const targetTags = new DeclaredTagDictionary();
    const source = quietConfig(sourceTags);
    const target = quietConfig(targetTags);
    source.parseOption('new-inline-tags', 'x');
    source.parseOption('wrap', '40');
    target.parseOption('new-inline-tags', 'y');

    target.copyFrom(source);
    expect(target.getString(OptionId.InlineTags)).toBe('x');
    expect(target.getInt(OptionId.Wrap)).toBe(40);
    expect(targetTags.lookup('x')).toBe('inline');
    expect(targetTags.lookup('y')).toBeUndefined();
    expect(sourceTags.lookup('y')).toBeUndefined();

    target.restoreSnapshot();
    expect(target.getString(OptionId.InlineTags)).toBe('y');
    expect(target.getInt(OptionId.Wrap)).toBe(68);
    expect(targetTags.lookup('y')).toBe('inline');
    expect(targetTags.lookup('x')).toBeUndefined();
  });

  it('does nothing when copying onto itself', () => {
    const config = quietConfig();
    config.parseOption('wrap', '40');
    config.copyFrom(config);
    expect(config.getInt(OptionId.Wrap)).toBe(40);
    expect(config.diffFromSnapshot()).toBe(true);
  });
});

describe('changedUserTagOptions', () => {
  it('lists only the tag options whose values differ', () => {
    const config = quietConfig();
    const before = [...config.store.values()];
    const after = [...before];
    after[OptionId.PreTags] = stringValue('listing');
    after[OptionId.Wrap] = integerValue(10);

    expect(changedUserTagOptions(before, after)).toEqual([
      { optionId: OptionId.PreTags, category: 'pre' },
    ]);
    expect(changedUserTagOptions(before, before)).toEqual([]);
    expect(before[OptionId.PreTags]).toBe(DEFAULT_STRING);
  });
});
