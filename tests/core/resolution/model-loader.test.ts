import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { GeneratorModelLoader } from '../../../src/core/resolution/model-loader.js';
import { ManifestTargetGenerator } from '../../../src/core/resolution/manifest-target-generator.js';
import { addingTarget } from '../../../src/core/resolution/translators/project.js';
import { createCollectingDiagnostics } from '../../../src/core/ports/index.js';
import { ManifestNotFoundError } from '../../../src/utils/errors.js';
import {
  InMemoryFileHandler,
  StubManifestLoader,
  projectManifest,
  targetManifest,
} from '../../test-helpers.js';

function createLoader(
  manifests: ConstructorParameters<typeof StubManifestLoader>,
  fileHandler = new InMemoryFileHandler()
) {
  const diagnostics = createCollectingDiagnostics();
  const loader = new GeneratorModelLoader({
    fileHandler,
    manifestLoader: new StubManifestLoader(...manifests),
    manifestTargetGenerator: new ManifestTargetGenerator({ swiftVersion: '5.0' }),
    diagnostics,
  });
  return { loader, diagnostics, fileHandler };
}

describe('GeneratorModelLoader.loadProject', () => {
  it('appends the manifest target after the declared targets', async () => {
    const { loader } = createLoader([{
      '/work/App': projectManifest({
        name: 'App',
        targets: [targetManifest({ name: 'App' }), targetManifest({ name: 'AppTests', product: 'unitTests' })],
      }),
    }]);

    const project = await loader.loadProject('/work/App');

    assert.equal(project.path, '/work/App');
    assert.deepEqual(project.targets.map(target => target.name), ['App', 'AppTests', 'App-Manifest']);

    const manifestTarget = project.targets[2];
    assert.ok(manifestTarget);
    assert.equal(manifestTarget.platform, 'macOS');
    assert.equal(manifestTarget.product, 'staticFramework');
    assert.deepEqual(manifestTarget.sources, ['/work/App/Project.yml']);
    assert.deepEqual(manifestTarget.settings?.base, { SWIFT_VERSION: '5.0' });
    assert.deepEqual(manifestTarget.filesGroup, { type: 'group', name: 'Manifest' });
  });

  it('resolves a relative project path from the working directory', async () => {
    const root = process.cwd();
    const { loader } = createLoader([{ [root]: projectManifest({ name: 'Here' }) }]);

    const project = await loader.loadProject('.');

    assert.equal(project.path, root);
    assert.deepEqual(project.targets.map(target => target.name), ['Here-Manifest']);
  });

  it('fails when no project manifest exists', async () => {
    const { loader } = createLoader([{}]);

    await assert.rejects(loader.loadProject('/work/Nothing'), ManifestNotFoundError);
  });

  it('does not share glob results between calls', async () => {
    const fileHandler = new InMemoryFileHandler({ files: ['/work/App/Sources/main.swift'] });
    const { loader } = createLoader([{
      '/work/App': projectManifest({ targets: [targetManifest({ sources: ['Sources/*.swift'] })] }),
    }], fileHandler);

    await loader.loadProject('/work/App');
    await loader.loadProject('/work/App');

    assert.equal(fileHandler.globCalls.length, 2);
  });

  it('reports warnings through the injected diagnostics', async () => {
    const { loader, diagnostics } = createLoader([{
      '/work/App': projectManifest({ targets: [targetManifest({ sources: ['Sources/*.swift'] })] }),
    }]);

    const project = await loader.loadProject('/work/App');

    assert.deepEqual(project.targets[0]?.sources, []);
    assert.deepEqual(diagnostics.warnings, ['No files found at: Sources/*.swift']);
  });
});

describe('GeneratorModelLoader.loadWorkspace', () => {
  it('keeps matched directories the manifest loader classifies as projects', async () => {
    const fileHandler = new InMemoryFileHandler({
      directories: ['/work/Projects/App', '/work/Projects/Kit', '/work/Projects/Assets'],
    });
    const { loader, diagnostics } = createLoader([
      {
        '/work/Projects/App': projectManifest({ name: 'App' }),
        '/work/Projects/Kit': projectManifest({ name: 'Kit' }),
      },
      { '/work': { name: 'Suite', projects: ['Projects/*'], additionalFiles: [] } },
    ], fileHandler);

    const workspace = await loader.loadWorkspace('/work');

    assert.equal(workspace.name, 'Suite');
    assert.deepEqual(workspace.projects, ['/work/Projects/App', '/work/Projects/Kit']);
    assert.deepEqual(diagnostics.warnings, []);
  });

  it('does not append anything to a workspace', async () => {
    const { loader } = createLoader([{}, { '/work': { name: 'Empty', projects: [], additionalFiles: [] } }]);

    const workspace = await loader.loadWorkspace('/work');

    assert.deepEqual(workspace, { name: 'Empty', projects: [], additionalFiles: [] });
  });
});

describe('addingTarget', () => {
  it('returns a new project and leaves the original untouched', async () => {
    const { loader } = createLoader([{ '/work/App': projectManifest({ targets: [targetManifest()] }) }]);
    const project = await loader.loadProject('/work/App');
    const generator = new ManifestTargetGenerator({ swiftVersion: '5.0' });

    const extended = addingTarget(project, generator.generateManifestTarget('Extra', '/work/App'));

    assert.notEqual(extended, project);
    assert.equal(project.targets.length, 2);
    assert.deepEqual(extended.targets.map(target => target.name), ['App', 'App-Manifest', 'Extra-Manifest']);
  });
});

describe('ManifestTargetGenerator', () => {
  it('adds search paths when a description library path is configured', () => {
    const generator = new ManifestTargetGenerator({ swiftVersion: '5.9', descriptionLibraryPath: '/opt/description' });

    const target = generator.generateManifestTarget('App', '/work/App');

    assert.equal(target.name, 'App-Manifest');
    assert.equal(target.bundleId, 'dev.xcgraph.manifests.${PRODUCT_NAME:rfc1034identifier}');
    assert.deepEqual(target.settings?.base, {
      FRAMEWORK_SEARCH_PATHS: '/opt/description',
      LIBRARY_SEARCH_PATHS: '/opt/description',
      SWIFT_INCLUDE_PATHS: '/opt/description',
      SWIFT_VERSION: '5.9',
    });
  });
});
