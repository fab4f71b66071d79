import { describe, it, beforeAll, afterAll, expect } from 'vitest';
import * as path from 'path';
import { defaultOutputPath, detectFormat, validateInputPath, validateOutputPath } from '../src/pathHelpers.js';
import { UnsupportedInputError } from '../src/errorHelpers.js';
import { setupTest, type TestContext } from './harness.js';

describe('detectFormat', () => {
  it('recognizes Markdown and Word extensions', () => {
    expect(detectFormat('notes.md')).toBe('markdown');
    expect(detectFormat('notes.markdown')).toBe('markdown');
    expect(detectFormat('REPORT.DOCX')).toBe('docx');
  });

  it('returns null for anything else', () => {
    expect(detectFormat('notes.txt')).toBeNull();
    expect(detectFormat('noextension')).toBeNull();
  });
});

describe('defaultOutputPath', () => {
  it('swaps the extension in the same directory', () => {
    expect(defaultOutputPath('/docs/plan.md', 'markdown')).toBe(path.join('/docs', 'plan.docx'));
    expect(defaultOutputPath('/docs/plan.v2.docx', 'docx')).toBe(path.join('/docs', 'plan.v2.md'));
  });
});

describe('validateInputPath', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await setupTest('mddocx-paths-');
  });

  afterAll(async () => {
    await ctx.cleanup();
  });

  it('accepts a readable file with the expected extension', async () => {
    const file = await ctx.write('a.md', '# a');
    expect(await validateInputPath(file, 'markdown')).toEqual({ resolvedPath: file });
  });

  it('rejects the wrong extension unless forced', async () => {
    const file = await ctx.write('a.docx', 'x');
    await expect(validateInputPath(file, 'markdown')).rejects.toThrow(
      `File doesn't have .md extension: ${file} (use --force to convert it anyway)`
    );
    expect(await validateInputPath(file, 'markdown', true)).toEqual({
      resolvedPath: file,
      warning: `File doesn't have .md extension: ${file}`,
    });
  });
});

describe('validateOutputPath', () => {
  it('rejects the input path itself', () => {
    expect(() => validateOutputPath('/tmp/x.md', '/tmp/../tmp/x.md')).toThrow(UnsupportedInputError);
  });

  it('resolves a different path', () => {
    expect(validateOutputPath('/tmp/y.docx', '/tmp/x.md')).toEqual({ resolvedPath: '/tmp/y.docx' });
  });
});
