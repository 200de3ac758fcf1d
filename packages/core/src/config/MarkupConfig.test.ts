/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DebugLogger } from '../debug/DebugLogger.js';
import { CharEncoding } from '../encoding/charEncodings.js';
import { DeclaredTagDictionary } from '../tags/tagDictionary.js';
import { ConfigFileError, type ConfigDiagnostic } from './errors.js';
import { MarkupConfig } from './MarkupConfig.js';
import {
  DoctypeMode,
  OptionId,
  TriState,
  UNLIMITED_WRAP,
} from './optionIds.js';

describe('MarkupConfig', () => {
  let dir: string;
  let diagnostics: ConfigDiagnostic[];

  const reporter = {
    report(diagnostic: ConfigDiagnostic) {
      diagnostics.push(diagnostic);
    },
  };

  function writeConfig(name: string, content: string | Uint8Array): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'markup-config-'));
    diagnostics = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('parseFile', () => {
    it('reads quoted values, continuation lines and integers', () => {
      const tags = new DeclaredTagDictionary();
      const config = new MarkupConfig({ tagDictionary: tags, reporter });
      const path = writeConfig(
        'basic.conf',
        'doctype: "-//W3C//DTD Custom//EN"\n' +
          'new-blocklevel-tags: foo,\n' +
          '  bar\n' +
          'wrap: 20\n',
      );

      expect(config.parseFile(path)).toEqual({
        status: 'clean',
        errorCount: 0,
      });
      expect(config.getString(OptionId.Doctype)).toBe('-//W3C//DTD Custom//EN');
      expect(config.getInt(OptionId.DoctypeMode)).toBe(DoctypeMode.User);
      expect(config.getString(OptionId.BlockTags)).toBe('foo, bar');
      expect(tags.getDeclaredTags('block')).toEqual(['foo', 'bar']);
      expect(config.isTagCategoryDefined('block')).toBe(true);
      expect(config.getInt(OptionId.Wrap)).toBe(20);
      expect(diagnostics).toEqual([]);
    });

    it('applies the consistency rules afterwards', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig('wrap.conf', 'wrap: 0\n');

      config.parseFile(path);
      expect(config.getInt(OptionId.Wrap)).toBe(UNLIMITED_WRAP);
      expect(config.getInt(OptionId.IndentSpaces)).toBe(0);
      expect(config.diffFromDefault()).toBe(true);
    });

    it('skips comments and lines without a colon', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig(
        'comments.conf',
        '# wrap: 10\n// wrap: 11\njust some words\n\nwrap: 12\n',
      );

      expect(config.parseFile(path).status).toBe('clean');
      expect(config.getInt(OptionId.Wrap)).toBe(12);
    });

    it('decodes the file in the given encoding', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig(
        'latin1.conf',
        Uint8Array.from([...Buffer.from('alt-text: caf'), 0xe9, 0x0a]),
      );

      config.parseFile(path, 'latin1');
      expect(config.getString(OptionId.AltText)).toBe('café');
    });

    it('decodes windows-1252 punctuation', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig(
        'win1252.conf',
        Uint8Array.from([...Buffer.from('alt-text: 5 '), 0x80, 0x0a]),
      );

      expect(config.parseFile(path, 'win1252').status).toBe('clean');
      expect(config.getString(OptionId.AltText)).toBe('5 €');
    });

    it('reports bad values and keeps going', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig('bad.conf', 'wrap: lots\nquiet: yes\n');

      expect(config.parseFile(path)).toEqual({
        status: 'warnings',
        errorCount: 1,
      });
      expect(config.getInt(OptionId.Wrap)).toBe(68);
      expect(config.getBool(OptionId.Quiet)).toBe(true);
      expect(diagnostics).toEqual([
        {
          kind: 'bad-argument',
          subject: 'wrap',
          message: 'Invalid value for option "wrap"',
        },
      ]);
    });

    it('reports an over-long option name as unknown', () => {
      const config = new MarkupConfig({ reporter });
      const name = 'a'.repeat(65);
      const path = writeConfig('long.conf', `${name}: 1\nwrap: 30\n`);

      expect(config.parseFile(path).errorCount).toBe(1);
      expect(diagnostics[0]?.kind).toBe('unknown-option');
      expect(diagnostics[0]?.subject).toBe(name);
      expect(config.getInt(OptionId.Wrap)).toBe(30);
    });

    it('reports unknown options and reads the next line', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig('bogus.conf', 'bogus: 1\nwrap: 30\n');

      expect(config.parseFile(path)).toEqual({
        status: 'warnings',
        errorCount: 1,
      });
      expect(config.optionErrors).toBe(1);
      expect(diagnostics[0]?.subject).toBe('bogus');
      expect(config.getInt(OptionId.Wrap)).toBe(30);
    });

    it('reports an option that cannot be set directly', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig('mode.conf', 'doctype-mode: strict\n');

      expect(config.parseFile(path).errorCount).toBe(1);
      expect(diagnostics[0]?.kind).toBe('bad-argument');
      expect(diagnostics[0]?.subject).toBe('doctype-mode');
    });

    it('offers unknown options to the handler', () => {
      const handler = vi.fn(() => true);
      const config = new MarkupConfig({
        reporter,
        unknownOptionHandler: handler,
      });
      const path = writeConfig(
        'unknown.conf',
        'x-custom: "hello   world"\nwrap: 30\n',
      );

      expect(config.parseFile(path).status).toBe('clean');
      expect(handler).toHaveBeenCalledWith('x-custom', 'hello world', config);
      expect(config.getInt(OptionId.Wrap)).toBe(30);
    });

    it('lets the handler map another spelling onto a known option', () => {
      const config = new MarkupConfig({
        reporter,
        unknownOptionHandler: (name, value, target) =>
          name === 'legacy-mark' && target.parseOption('generator-mark', value),
      });
      const path = writeConfig('legacy.conf', 'legacy-mark: no\n');

      expect(config.parseFile(path).status).toBe('clean');
      expect(config.getBool(OptionId.Mark)).toBe(false);
      expect(diagnostics).toEqual([]);
    });

    it('reports unknown options the handler declines', () => {
      const handler = vi.fn(() => false);
      const config = new MarkupConfig({
        reporter,
        unknownOptionHandler: handler,
      });
      const path = writeConfig('declined.conf', 'x-custom: 1\n');

      expect(config.parseFile(path)).toEqual({
        status: 'warnings',
        errorCount: 1,
      });
      expect(handler).toHaveBeenCalledOnce();
      expect(diagnostics).toEqual([
        {
          kind: 'unknown-option',
          subject: 'x-custom',
          message: 'Unknown option "x-custom"',
        },
      ]);
    });

    it('fails without touching options when the file is missing', () => {
      const config = new MarkupConfig({ reporter });
      const result = config.parseFile(join(dir, 'missing.conf'));

      expect(result.status).toBe('fatal');
      expect(result.errorCount).toBe(0);
      expect(result.error).toBeInstanceOf(ConfigFileError);
      expect(config.optionErrors).toBe(0);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]?.kind).toBe('file-open-failure');
      expect(diagnostics[0]?.subject).toBe(join(dir, 'missing.conf'));
      expect(config.getInt(OptionId.IndentSpaces)).toBe(2);
    });

    it('fails for an unknown file encoding', () => {
      const config = new MarkupConfig({ reporter });
      const path = writeConfig('any.conf', 'wrap: 20\n');

      const result = config.parseFile(path, 'klingon');
      expect(result.status).toBe('fatal');
      expect(result.error?.message).toBe(
        `Cannot open configuration file "${path}": unknown encoding "klingon"`,
      );
      expect(config.getInt(OptionId.Wrap)).toBe(68);
    });
  });

  describe('parseOption', () => {
    it('reports unknown options without a handler', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.parseOption('no-such-option', '1')).toBe(false);
      expect(config.optionErrors).toBe(1);
      expect(config.diagnostics).toEqual([
        {
          kind: 'unknown-option',
          subject: 'no-such-option',
          message: 'Unknown option "no-such-option"',
        },
      ]);
      expect(config.diffFromDefault()).toBe(false);
    });

    it('matches option names case-insensitively', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.parseOption('Wrap', '72')).toBe(true);
      expect(config.getInt(OptionId.Wrap)).toBe(72);
    });

    it('derives stream encodings from char-encoding', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.parseOption('char-encoding', 'mac')).toBe(true);
      expect(config.getInt(OptionId.CharEncoding)).toBe(CharEncoding.MacRoman);
      expect(config.getInt(OptionId.InputEncoding)).toBe(CharEncoding.MacRoman);
      expect(config.getInt(OptionId.OutputEncoding)).toBe(CharEncoding.Ascii);
    });

    it('leaves the other encodings alone for input-encoding', () => {
      const config = new MarkupConfig({ reporter });
      config.parseOption('input-encoding', 'latin1');
      expect(config.getInt(OptionId.InputEncoding)).toBe(CharEncoding.Latin1);
      expect(config.getInt(OptionId.CharEncoding)).toBe(CharEncoding.Utf8);
      expect(config.getInt(OptionId.OutputEncoding)).toBe(CharEncoding.Utf8);
    });
  });

  describe('parseValueById', () => {
    it('reports an id outside the registry', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.parseValueById(500, '1')).toBe(false);
      expect(diagnostics[0]).toEqual({
        kind: 'unknown-option',
        subject: '500',
        message: 'Unknown option "500"',
      });
    });

    it('reports options without a parser', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.parseValueById(OptionId.DoctypeMode, 'strict')).toBe(false);
      expect(diagnostics[0]?.kind).toBe('bad-argument');
    });
  });

  describe('typed access', () => {
    it('reads the defaults', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.getInt(OptionId.Wrap)).toBe(68);
      expect(config.getBool(OptionId.FixUri)).toBe(true);
      expect(config.getAutoBool(OptionId.MergeDivs)).toBe(TriState.Auto);
      expect(config.getString(OptionId.AltText)).toBeNull();
      expect(config.getInt(OptionId.AltText)).toBe(0);
      expect(config.getPickLabel(OptionId.Indent)).toBe('no');
      expect(config.getPickLabel(OptionId.Wrap)).toBeUndefined();
    });

    it('rejects values of the wrong kind', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.setInt(OptionId.Quiet, 1)).toBe(false);
      expect(config.setBool(OptionId.Wrap, true)).toBe(false);
      expect(config.setString(OptionId.Wrap, '10')).toBe(false);
      expect(config.setInt(OptionId.Wrap, -1)).toBe(false);
      expect(config.setInt(OptionId.Wrap, 1.5)).toBe(false);
      expect(config.diffFromDefault()).toBe(false);
    });

    it('stores an empty string as the default', () => {
      const config = new MarkupConfig({ reporter });
      expect(config.setString(OptionId.AltText, 'image')).toBe(true);
      expect(config.getString(OptionId.AltText)).toBe('image');
      expect(config.setString(OptionId.AltText, '')).toBe(true);
      expect(config.getString(OptionId.AltText)).toBeNull();
    });

    it('has no input outside a parse', () => {
      const config = new MarkupConfig({ reporter });
      expect(() => config.input).toThrow(
        'No configuration input is being parsed',
      );
    });
  });

  describe('reset', () => {
    it('resets a single option', () => {
      const config = new MarkupConfig({ reporter });
      config.parseOption('wrap', '20');
      expect(config.resetOptionToDefault(OptionId.Wrap)).toBe(true);
      expect(config.getInt(OptionId.Wrap)).toBe(68);
      expect(config.resetOptionToDefault(OptionId.Unknown)).toBe(false);
    });

    it('resets every option and frees declared tags', () => {
      const tags = new DeclaredTagDictionary();
      const config = new MarkupConfig({ tagDictionary: tags, reporter });
      config.parseOption('new-inline-tags', 'x');
      config.parseOption('wrap', '20');

      config.resetToDefault();
      expect(config.diffFromDefault()).toBe(false);
      expect(tags.size).toBe(0);
      expect(config.isTagCategoryDefined('inline')).toBe(false);
    });

    it('leaves a disposed configuration at its defaults', () => {
      const tags = new DeclaredTagDictionary();
      const config = new MarkupConfig({ tagDictionary: tags, reporter });
      config.parseOption('new-pre-tags', 'listing');
      config.parseOption('wrap', '20');

      config.dispose();
      expect(config.getInt(OptionId.Wrap)).toBe(68);
      expect(config.getString(OptionId.PreTags)).toBeNull();
      expect(config.diffFromSnapshot()).toBe(false);
      expect(tags.size).toBe(0);
    });
  });

  describe('reporting', () => {
    it('sends diagnostics to a custom reporter', () => {
      const report = vi.fn();
      const config = new MarkupConfig({ reporter: { report } });
      config.parseOption('wrap', 'lots');
      expect(report).toHaveBeenCalledWith({
        kind: 'bad-argument',
        subject: 'wrap',
        message: 'Invalid value for option "wrap"',
      });
    });

    it('logs diagnostics by default', () => {
      const logger = DebugLogger.getLogger('markup-config:diagnostics');
      logger.enabled = true;
      const config = new MarkupConfig();

      config.parseOption('no-such-option', '1');
      expect(logger.lastEntry?.level).toBe('warn');
      expect(logger.lastEntry?.message).toBe('Unknown option "no-such-option"');

      config.parseFile(join(dir, 'missing.conf'));
      expect(logger.lastEntry?.level).toBe('error');
    });
  });
});
