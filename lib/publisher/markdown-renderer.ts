import { access } from 'node:fs/promises';
import * as path from 'path';
import { Marked, type Token, type Tokens } from 'marked';
import { readSiteTree, sortSiteTree, writeSiteTree } from './site-tree.js';
import type { Renderer, SiteFile, SiteTree } from './types.js';

export interface MarkdownRendererOptions {
  readonly sourceDir: string;
  /** When set, the rendered tree is also written here. */
  readonly outDir?: string;
  readonly siteName?: string;
}

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

function isLink(token: Token): token is Tokens.Link {
  return token.type === 'link';
}

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading';
}

/** Title text of a heading's inline tokens, without Markdown markup. */
function plainText(tokens: readonly Token[]): string {
  return tokens
    .map((token) => {
      if (token.type === 'codespan') {
        return token.raw.replace(/^`+ ?| ?`+$/g, '');
      }
      if (token.type === 'escape') {
        return token.raw.slice(1);
      }
      if (token.type === 'html') {
        return '';
      }
      if (token.type === 'image') {
        return String(token.text);
      }
      if ('tokens' in token && Array.isArray(token.tokens) && token.tokens.length > 0) {
        return plainText(token.tokens);
      }
      return token.raw;
    })
    .join('');
}

/** True when `inner` equals `outer` or lies beneath it. */
function isWithin(outer: string, inner: string): boolean {
  const relative = path.relative(path.resolve(outer), path.resolve(inner));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Directory URL of a Markdown page: `index.md` -> '', `guides/index.md` ->
 * 'guides/', `guides/testing.md` -> 'guides/testing/'.
 */
export function pageDirFor(sourcePath: string): string {
  const stem = sourcePath.slice(0, -'.md'.length);
  const dir = path.posix.basename(stem) === 'index' ? path.posix.dirname(stem) : stem;
  return dir === '.' ? '' : `${dir}/`;
}

export function outputPathFor(sourcePath: string): string {
  return `${pageDirFor(sourcePath)}index.html`;
}

/** Rewrites a relative link to a `.md` page into a directory URL. */
export function rewritePageLink(href: string, sourcePath: string): string {
  if (SCHEME.test(href) || href.startsWith('/') || href.startsWith('#')) {
    return href;
  }

  const hashIndex = href.indexOf('#');
  const target = hashIndex === -1 ? href : href.slice(0, hashIndex);
  const hash = hashIndex === -1 ? '' : href.slice(hashIndex);
  if (!target.endsWith('.md')) {
    return href;
  }

  const targetSource = path.posix.normalize(path.posix.join(path.posix.dirname(sourcePath), target));
  const from = pageDirFor(sourcePath) || '.';
  const to = pageDirFor(targetSource) || '.';
  const relative = path.posix.relative(from, to);
  return (relative === '' ? './' : `${relative}/`) + hash;
}

export class MarkdownRenderer implements Renderer {
  private readonly marked = new Marked({ gfm: true });
  private readonly siteName: string;

  constructor(private readonly options: MarkdownRendererOptions) {
    this.siteName = options.siteName ?? 'HLA-Compass Documentation';
  }

  async build(): Promise<SiteTree> {
    const { sourceDir, outDir } = this.options;
    if (outDir && (isWithin(outDir, sourceDir) || isWithin(sourceDir, outDir))) {
      throw new Error(`Output directory ${outDir} must not contain or sit inside the source directory ${sourceDir}`);
    }
    try {
      await access(path.join(sourceDir, 'index.md'));
    } catch (error) {
      throw new Error(`Documentation source ${sourceDir} has no index.md`, { cause: error });
    }

    const sources = await readSiteTree(sourceDir);
    const outputs: SiteFile[] = [];
    const seen = new Map<string, string>();

    for (const file of sources) {
      const output = file.path.endsWith('.md') ? this.renderPage(file) : file;
      const previous = seen.get(output.path);
      if (previous !== undefined) {
        throw new Error(`${file.path} and ${previous} both render to ${output.path}`);
      }
      seen.set(output.path, file.path);
      outputs.push(output);
    }

    const tree = sortSiteTree(outputs);
    if (outDir) {
      await writeSiteTree(tree, outDir);
    }
    return tree;
  }

  renderPage(file: SiteFile): SiteFile {
    const tokens = this.marked.lexer(Buffer.from(file.body).toString('utf-8'));
    this.marked.walkTokens(tokens, (token) => {
      if (isLink(token)) {
        token.href = rewritePageLink(token.href, file.path);
      }
    });

    const heading = tokens.find((token) => isHeading(token) && token.depth === 1);
    const title = heading && isHeading(heading)
      ? plainText(heading.tokens)
      : path.posix.basename(file.path, '.md');
    const content = this.marked.parser(tokens);

    const html = `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} - ${escapeHtml(this.siteName)}</title>
</head>
<body>
<main>
${content}</main>
</body>
</html>
`;

    return {
      path: outputPathFor(file.path),
      body: Buffer.from(html, 'utf-8'),
      contentType: 'text/html; charset=utf-8',
    };
  }
}
