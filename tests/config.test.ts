import { describe, it, beforeAll, afterAll, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFile, resolveConfig } from '../src/config.js';
import { ConfigError, FileNotFoundError } from '../src/errorHelpers.js';
import { setupTest, type TestContext } from './harness.js';

describe('resolveConfig', () => {
  it('fills in every default', () => {
    expect(resolveConfig()).toEqual({
      nestedBulletIndent: 2,
      quoteIndentTwips: 576,
      ruleStyle: 'border',
      ruleGlyph: '─',
      ruleGlyphLength: 50,
      ruleMinLength: 10,
      font: 'Calibri',
      fontSize: 11,
    });
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('keeps given values', () => {
    expect(resolveConfig({ nestedBulletIndent: 4, font: 'Arial' })).toMatchObject({ nestedBulletIndent: 4, font: 'Arial' });
  });

  it('names the offending key', () => {
    expect(() => resolveConfig({ ruleStyle: 'dots' })).toThrow(ConfigError);
    expect(() => resolveConfig({ nestedBulletIndent: 0 })).toThrow(/^Invalid configuration: nestedBulletIndent: /);
  });

  it('requires the glyph line to be longer than the rule minimum', () => {
    expect(() => resolveConfig({ ruleGlyphLength: 8 })).toThrow(
      'Invalid configuration: ruleGlyphLength: must be greater than ruleMinLength (10)'
    );
    expect(() => resolveConfig({ ruleGlyphLength: 10 })).toThrow(ConfigError);
    expect(resolveConfig({ ruleGlyphLength: 8, ruleMinLength: 7 }).ruleGlyphLength).toBe(8);
  });

  it('rejects unknown keys', () => {
    expect(() => resolveConfig({ colour: 'red' })).toThrow(ConfigError);
  });

  it('rejects a non-object', () => {
    expect(() => resolveConfig(42)).toThrow(/^Invalid configuration: \(root\): /);
  });
});

describe('loadConfigFile', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTest('mddocx-config-');
  });

  afterAll(async () => {
    await ctx.cleanup();
  });

  it('reads and validates a JSON file', async () => {
    const file = await ctx.write('ok.json', '{ "quoteIndentTwips": 720 }');
    expect((await loadConfigFile(file)).quoteIndentTwips).toBe(720);
  });

  it('fails with FileNotFound for a missing file', async () => {
    await expect(loadConfigFile(ctx.file('none.json'))).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('fails with ConfigError for malformed JSON', async () => {
    const file = await ctx.write('broken.json', '{ nope');
    await expect(loadConfigFile(file)).rejects.toThrow(`Config file ${file} is not valid JSON`);
  });
});
