import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { workspaceFromManifest } from '../../../src/core/resolution/workspace-assembler.js';
import { InMemoryFileHandler, StubClassifier, createTestContext } from '../../test-helpers.js';

describe('workspaceFromManifest', () => {
  it('keeps only directories that hold a project manifest', async () => {
    const fileHandler = new InMemoryFileHandler({
      directories: ['/ws/Projects/App', '/ws/Projects/Docs', '/ws/Projects/Kit'],
      files: ['/ws/Projects/README.md'],
    });
    const classifier = new StubClassifier(['/ws/Projects/App', '/ws/Projects/Kit']);
    const ctx = createTestContext('/ws', fileHandler);

    const workspace = await workspaceFromManifest(
      { name: 'Suite', projects: ['Projects/*'], additionalFiles: [] },
      ctx,
      classifier
    );

    assert.equal(workspace.name, 'Suite');
    assert.deepEqual(workspace.projects, ['/ws/Projects/App', '/ws/Projects/Kit']);
    assert.deepEqual(workspace.additionalFiles, []);
    assert.deepEqual(ctx.diagnostics.warnings, []);
    // Plain files are rejected before the classifier is asked
    assert.equal(classifier.queried.includes('/ws/Projects/README.md'), false);
  });

  it('warns once when a pattern yields no project', async () => {
    const fileHandler = new InMemoryFileHandler({ directories: ['/ws/Tools/Scripts'] });
    const ctx = createTestContext('/ws', fileHandler);

    const workspace = await workspaceFromManifest(
      { name: 'Suite', projects: ['Tools/*', 'Missing/*'], additionalFiles: [] },
      ctx,
      new StubClassifier([])
    );

    assert.deepEqual(workspace.projects, []);
    assert.deepEqual(ctx.diagnostics.warnings, [
      'No projects found at: Tools/*',
      'No projects found at: Missing/*',
    ]);
  });

  it('lists a project matched by overlapping patterns once', async () => {
    const fileHandler = new InMemoryFileHandler({ directories: ['/ws/App', '/ws/Kit'] });
    const ctx = createTestContext('/ws', fileHandler);

    const workspace = await workspaceFromManifest(
      { name: 'Suite', projects: ['Kit', '*'], additionalFiles: [] },
      ctx,
      new StubClassifier(['/ws/App', '/ws/Kit'])
    );

    assert.deepEqual(workspace.projects, ['/ws/Kit', '/ws/App']);
  });

  it('finds projects next to the workspace directory', async () => {
    const fileHandler = new InMemoryFileHandler({
      directories: ['/ws/Apps', '/ws/Frameworks/Kit', '/ws/Frameworks/UI'],
    });
    const ctx = createTestContext('/ws/Apps', fileHandler);

    const workspace = await workspaceFromManifest(
      { name: 'Suite', projects: ['../Frameworks/*'], additionalFiles: [] },
      ctx,
      new StubClassifier(['/ws/Frameworks/Kit', '/ws/Frameworks/UI'])
    );

    assert.deepEqual(workspace.projects, ['/ws/Frameworks/Kit', '/ws/Frameworks/UI']);
    assert.deepEqual(ctx.diagnostics.warnings, []);
  });

  it('resolves additional files against the workspace directory', async () => {
    const fileHandler = new InMemoryFileHandler({
      files: ['/ws/Docs/guide.md', '/ws/Docs/intro.md'],
      directories: ['/ws/App'],
    });
    const ctx = createTestContext('/ws', fileHandler);

    const workspace = await workspaceFromManifest(
      {
        name: 'Suite',
        projects: ['App'],
        additionalFiles: [
          { type: 'glob', pattern: 'Docs/*.md' },
          { type: 'folderReference', path: 'Docs' },
        ],
      },
      ctx,
      new StubClassifier(['/ws/App'])
    );

    assert.deepEqual(workspace.additionalFiles, [
      { type: 'file', path: '/ws/Docs/guide.md' },
      { type: 'file', path: '/ws/Docs/intro.md' },
      { type: 'folderReference', path: '/ws/Docs' },
    ]);
  });
});
