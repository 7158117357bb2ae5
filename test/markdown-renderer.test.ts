import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  MarkdownRenderer,
  outputPathFor,
  pageDirFor,
  rewritePageLink,
} from '../lib/publisher/markdown-renderer.js';

async function writeSource(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(root, name);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

describe('pageDirFor', () => {
  test('maps pages to directory URLs', () => {
    expect(pageDirFor('index.md')).toBe('');
    expect(pageDirFor('guides/index.md')).toBe('guides/');
    expect(pageDirFor('guides/testing.md')).toBe('guides/testing/');
    expect(outputPathFor('guides/testing.md')).toBe('guides/testing/index.html');
    expect(outputPathFor('index.md')).toBe('index.html');
  });
});

describe('rewritePageLink', () => {
  test('rewrites relative Markdown links to directory URLs', () => {
    expect(rewritePageLink('guides/testing.md', 'index.md')).toBe('guides/testing/');
    expect(rewritePageLink('../index.md#top', 'guides/testing.md')).toBe('../../#top');
    expect(rewritePageLink('testing.md', 'guides/index.md')).toBe('testing/');
    expect(rewritePageLink('index.md', 'guides/index.md')).toBe('./');
  });

  test('leaves other links alone', () => {
    expect(rewritePageLink('https://example.com/readme.md', 'index.md')).toBe('https://example.com/readme.md');
    expect(rewritePageLink('/guides/', 'index.md')).toBe('/guides/');
    expect(rewritePageLink('#install', 'index.md')).toBe('#install');
    expect(rewritePageLink('assets/logo.png', 'index.md')).toBe('assets/logo.png');
  });
});

describe('MarkdownRenderer', () => {
  let workDir: string;
  let sourceDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'docs-render-'));
    sourceDir = path.join(workDir, 'docs');
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  test('renders pages to directory URLs and copies assets', async () => {
    await writeSource(sourceDir, {
      'index.md': '# Home\n\nSee the [testing guide](guides/testing.md).\n',
      'guides/testing.md': '# Testing\n\nBack to [home](../index.md#top).\n',
      'guides/notes.md': 'Plain notes.\n',
      'assets/logo.png': Buffer.from([0x89, 0x50, 0x4e, 0x47]),
    });

    const tree = await new MarkdownRenderer({ sourceDir, siteName: 'Test Docs' }).build();

    expect(tree.map((file) => [file.path, file.contentType])).toEqual([
      ['assets/logo.png', 'image/png'],
      ['guides/notes/index.html', 'text/html; charset=utf-8'],
      ['guides/testing/index.html', 'text/html; charset=utf-8'],
      ['index.html', 'text/html; charset=utf-8'],
    ]);

    const [logo, notes, testing, index] = tree.map((file) => Buffer.from(file.body));
    expect([...logo]).toEqual([0x89, 0x50, 0x4e, 0x47]);

    const home = index.toString('utf-8');
    expect(home).toContain('<title>Home - Test Docs</title>');
    expect(home).toContain('<h1>Home</h1>');
    expect(home).toContain('<a href="guides/testing/">testing guide</a>');

    expect(testing.toString('utf-8')).toContain('<a href="../../#top">home</a>');
    expect(notes.toString('utf-8')).toContain('<title>notes - Test Docs</title>');
  });

  test('escapes HTML in page titles', async () => {
    await writeSource(sourceDir, { 'index.md': '# Tips & Tricks\n' });

    const [index] = await new MarkdownRenderer({ sourceDir }).build();

    expect(Buffer.from(index.body).toString('utf-8')).toContain(
      '<title>Tips &amp; Tricks - HLA-Compass Documentation</title>',
    );
  });

  test('builds titles from heading text without inline markup', async () => {
    await writeSource(sourceDir, {
      'index.md': '# Using `hla-compass` with **Docker**\n',
    });

    const [index] = await new MarkdownRenderer({ sourceDir, siteName: 'Test Docs' }).build();

    expect(Buffer.from(index.body).toString('utf-8')).toContain(
      '<title>Using hla-compass with Docker - Test Docs</title>',
    );
  });

  test('refuses an output directory that contains the sources', async () => {
    await writeSource(workDir, { 'mkdocs.yml': 'site_name: Test Docs\n' });
    await writeSource(sourceDir, { 'index.md': '# Home\n' });

    await expect(new MarkdownRenderer({ sourceDir, outDir: workDir }).build()).rejects.toThrow(
      `Output directory ${workDir} must not contain or sit inside the source directory ${sourceDir}`,
    );
    expect(await readFile(path.join(sourceDir, 'index.md'), 'utf-8')).toBe('# Home\n');
    expect(await readFile(path.join(workDir, 'mkdocs.yml'), 'utf-8')).toBe('site_name: Test Docs\n');
  });

  test('refuses an output directory equal to or inside the sources', async () => {
    await writeSource(sourceDir, { 'index.md': '# Home\n' });

    await expect(new MarkdownRenderer({ sourceDir, outDir: sourceDir }).build()).rejects.toThrow(
      'must not contain or sit inside the source directory',
    );
    await expect(
      new MarkdownRenderer({ sourceDir, outDir: path.join(sourceDir, 'site') }).build(),
    ).rejects.toThrow('must not contain or sit inside the source directory');
    expect(await readFile(path.join(sourceDir, 'index.md'), 'utf-8')).toBe('# Home\n');
  });

  test('writes the tree to the output directory, replacing old output', async () => {
    const outDir = path.join(workDir, 'site');
    await writeSource(outDir, { 'stale.html': 'old' });
    await writeSource(sourceDir, { 'index.md': '# Home\n' });

    await new MarkdownRenderer({ sourceDir, outDir }).build();

    const written = await readFile(path.join(outDir, 'index.html'), 'utf-8');
    expect(written).toContain('<h1>Home</h1>');
    await expect(readFile(path.join(outDir, 'stale.html'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('fails without an index page', async () => {
    await writeSource(sourceDir, { 'guide.md': '# Guide\n' });

    await expect(new MarkdownRenderer({ sourceDir }).build()).rejects.toThrow(
      `Documentation source ${sourceDir} has no index.md`,
    );
  });

  test('fails when two pages render to the same path', async () => {
    await writeSource(sourceDir, {
      'index.md': '# Home\n',
      'guides.md': '# Guides\n',
      'guides/index.md': '# Guides index\n',
    });

    await expect(new MarkdownRenderer({ sourceDir }).build()).rejects.toThrow(
      'guides/index.md and guides.md both render to guides/index.html',
    );
  });
});
