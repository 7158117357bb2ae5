import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'os';
import * as path from 'path';
import { BuildFailure } from '../lib/publisher/errors.js';
import { MkDocsRenderer } from '../lib/publisher/mkdocs-renderer.js';

// Stands in for the mkdocs executable so no Python toolchain is needed.
const node = process.execPath;

describe('MkDocsRenderer', () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await mkdtemp(path.join(os.tmpdir(), 'docs-mkdocs-'));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  test('reads the generated site directory after a successful build', async () => {
    const script = [
      "const fs = require('fs');",
      "fs.mkdirSync('out/guide', { recursive: true });",
      "fs.writeFileSync('out/index.html', '<h1>Home</h1>');",
      "fs.writeFileSync('out/guide/index.html', '<h1>Guide</h1>');",
    ].join(' ');

    const tree = await new MkDocsRenderer({
      projectDir,
      siteDir: 'out',
      command: node,
      args: ['-e', script],
    }).build();

    expect(tree.map((file) => [file.path, Buffer.from(file.body).toString('utf-8')])).toEqual([
      ['guide/index.html', '<h1>Guide</h1>'],
      ['index.html', '<h1>Home</h1>'],
    ]);
  });

  test('fails with the generator output when it exits non-zero', async () => {
    const renderer = new MkDocsRenderer({
      projectDir,
      siteDir: 'out',
      command: node,
      args: ['-e', "process.stderr.write('WARNING - nav entry missing\\n'); process.exit(1);"],
    });

    const attempt = renderer.build();

    await expect(attempt).rejects.toBeInstanceOf(BuildFailure);
    await expect(attempt).rejects.toThrow(`${node} exited with code 1: WARNING - nav entry missing`);
  });

  test('reports a missing executable with install instructions', async () => {
    const renderer = new MkDocsRenderer({
      projectDir,
      siteDir: 'out',
      command: 'mkdocs-missing-for-test',
    });

    await expect(renderer.build()).rejects.toThrow(
      "mkdocs-missing-for-test could not be found. Install it with 'pip install mkdocs-material'.",
    );
  });
});
