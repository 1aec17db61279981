import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type {
  PlatformManifest,
  ProductManifest,
  TargetDependencyManifest,
} from '../../../src/types/index.js';
import {
  buildConfigurationFromManifest,
  platformFromManifest,
  productFromManifest,
  targetActionOrderFromManifest,
} from '../../../src/core/resolution/translators/enums.js';
import { dependencyFromManifest } from '../../../src/core/resolution/translators/dependency.js';
import { settingsFromManifest } from '../../../src/core/resolution/translators/settings.js';
import { schemeFromManifest } from '../../../src/core/resolution/translators/scheme.js';
import { targetActionFromManifest } from '../../../src/core/resolution/translators/target-action.js';
import { headersFromManifest } from '../../../src/core/resolution/translators/headers.js';
import { coreDataModelFromManifest } from '../../../src/core/resolution/translators/core-data-model.js';
import { FeatureNotYetSupportedError, MissingFileError } from '../../../src/utils/errors.js';
import { ErrorCodes } from '../../../src/types/index.js';
import { InMemoryFileHandler, createTestContext } from '../../test-helpers.js';

describe('platform translation', () => {
  it('maps every implemented platform to itself', () => {
    const implemented: PlatformManifest[] = ['iOS', 'macOS', 'tvOS'];
    for (const platform of implemented) {
      assert.equal(platformFromManifest(platform), platform);
    }
  });

  it('rejects watchOS as not yet supported', () => {
    assert.throws(
      () => platformFromManifest('watchOS'),
      (error: unknown) => {
        assert.ok(error instanceof FeatureNotYetSupportedError);
        assert.equal(error.message, 'watchOS platform is not yet supported');
        assert.equal(error.code, ErrorCodes.FEATURE_NOT_YET_SUPPORTED);
        assert.equal(error.type, 'abort');
        return true;
      }
    );
  });
});

describe('closed enumerations', () => {
  it('maps every product kind', () => {
    const products: ProductManifest[] = [
      'app', 'staticLibrary', 'dynamicLibrary', 'framework', 'staticFramework', 'unitTests', 'uiTests',
    ];
    assert.deepEqual(products.map(productFromManifest), products);
  });

  it('maps build configurations and action orders', () => {
    assert.equal(buildConfigurationFromManifest('debug'), 'debug');
    assert.equal(buildConfigurationFromManifest('release'), 'release');
    assert.equal(targetActionOrderFromManifest('pre'), 'pre');
    assert.equal(targetActionOrderFromManifest('post'), 'post');
  });
});

describe('dependency translation', () => {
  it('keeps kind and paths of every dependency shape', () => {
    const cases: Array<[TargetDependencyManifest, unknown]> = [
      [{ type: 'target', name: 'Core' }, { type: 'target', name: 'Core' }],
      [
        { type: 'project', target: 'Networking', path: '../Networking' },
        { type: 'project', target: 'Networking', path: '../Networking' },
      ],
      [{ type: 'framework', path: 'Vendor/Analytics.framework' }, { type: 'framework', path: 'Vendor/Analytics.framework' }],
      [
        { type: 'library', path: 'Vendor/libCrypto.a', publicHeaders: 'Vendor/include', swiftModuleMap: 'Vendor/Crypto.modulemap' },
        { type: 'library', path: 'Vendor/libCrypto.a', publicHeaders: 'Vendor/include', swiftModuleMap: 'Vendor/Crypto.modulemap' },
      ],
    ];
    for (const [manifest, expected] of cases) {
      assert.deepEqual(dependencyFromManifest(manifest), expected);
    }
  });

  it('leaves an absent module map absent', () => {
    const dependency = dependencyFromManifest({ type: 'library', path: 'libA.a', publicHeaders: 'include' });
    assert.deepEqual(dependency, { type: 'library', path: 'libA.a', publicHeaders: 'include' });
    assert.equal('swiftModuleMap' in dependency, false);
  });
});

describe('settings translation', () => {
  it('anchors xcconfig files at the project directory', () => {
    const settings = settingsFromManifest({
      base: { PRODUCT_NAME: 'App' },
      debug: { settings: { SWIFT_OPTIMIZATION_LEVEL: '-Onone' }, xcconfig: 'Configs/Debug.xcconfig' },
    }, '/work/App');

    assert.deepEqual(settings.base, { PRODUCT_NAME: 'App' });
    assert.equal(settings.debug?.xcconfig, '/work/App/Configs/Debug.xcconfig');
    assert.deepEqual(settings.debug?.settings, { SWIFT_OPTIMIZATION_LEVEL: '-Onone' });
    assert.equal(settings.release, undefined);
  });

  it('leaves xcconfig unset when not declared', () => {
    const settings = settingsFromManifest({ base: {}, release: { settings: { A: '1' } } }, '/work/App');
    assert.equal(settings.release?.xcconfig, undefined);
  });
});

describe('target action translation', () => {
  it('resolves script paths and keeps tools as named', () => {
    const script = targetActionFromManifest(
      { name: 'Lint', path: 'scripts/lint.sh', order: 'pre', arguments: ['--strict'] },
      '/work/App'
    );
    const tool = targetActionFromManifest(
      { name: 'Format', tool: 'swiftformat', order: 'post', arguments: [] },
      '/work/App'
    );

    assert.equal(script.path, '/work/App/scripts/lint.sh');
    assert.equal(script.order, 'pre');
    assert.deepEqual(script.arguments, ['--strict']);
    assert.equal(tool.tool, 'swiftformat');
    assert.equal(tool.path, undefined);
    assert.equal(tool.order, 'post');
  });
});

describe('scheme translation', () => {
  it('copies build, test and run actions', () => {
    const scheme = schemeFromManifest({
      name: 'App',
      shared: true,
      buildAction: { targets: ['App'] },
      testAction: {
        targets: ['AppTests'],
        arguments: { environment: { MODE: 'test' }, launch: { '-verbose': true } },
        config: 'debug',
        coverage: true,
      },
      runAction: { config: 'release', executable: 'App' },
    });

    assert.equal(scheme.name, 'App');
    assert.equal(scheme.shared, true);
    assert.deepEqual(scheme.buildAction, { targets: ['App'] });
    assert.deepEqual(scheme.testAction?.targets, ['AppTests']);
    assert.deepEqual(scheme.testAction?.arguments, { environment: { MODE: 'test' }, launch: { '-verbose': true } });
    assert.equal(scheme.testAction?.config, 'debug');
    assert.equal(scheme.testAction?.coverage, true);
    assert.equal(scheme.runAction?.config, 'release');
    assert.equal(scheme.runAction?.executable, 'App');
    assert.equal(scheme.runAction?.arguments, undefined);
  });
});

describe('headers translation', () => {
  it('globs each group independently and defaults missing groups to empty', async () => {
    const fileHandler = new InMemoryFileHandler({
      files: ['/p/Public/A.h', '/p/Public/B.h', '/p/Private/C.h'],
    });
    const ctx = createTestContext('/p', fileHandler);

    const headers = await headersFromManifest({ public: 'Public/*.h', private: 'Private/*.h' }, ctx);

    assert.deepEqual(headers, {
      public: ['/p/Public/A.h', '/p/Public/B.h'],
      private: ['/p/Private/C.h'],
      project: [],
    });
    assert.deepEqual(ctx.diagnostics.warnings, []);
  });
});

describe('core data model translation', () => {
  it('fails with the exact missing path', async () => {
    const ctx = createTestContext('/p', new InMemoryFileHandler());

    await assert.rejects(
      coreDataModelFromManifest({ path: 'Model.xcdatamodeld', currentVersion: 'Model 2' }, ctx),
      (error: unknown) => {
        assert.ok(error instanceof MissingFileError);
        assert.equal(error.path, '/p/Model.xcdatamodeld');
        assert.equal(error.message, "Couldn't find file at path '/p/Model.xcdatamodeld'");
        return true;
      }
    );
  });

  it('discovers versions and keeps the declared current version unchecked', async () => {
    const fileHandler = new InMemoryFileHandler({
      files: [
        '/p/Model.xcdatamodeld/Model 2.xcdatamodel/contents',
        '/p/Model.xcdatamodeld/Model.xcdatamodel/contents',
      ],
    });
    const ctx = createTestContext('/p', fileHandler);

    const model = await coreDataModelFromManifest({ path: 'Model.xcdatamodeld', currentVersion: 'Model 3' }, ctx);

    assert.deepEqual(model, {
      path: '/p/Model.xcdatamodeld',
      versions: [
        '/p/Model.xcdatamodeld/Model 2.xcdatamodel',
        '/p/Model.xcdatamodeld/Model.xcdatamodel',
      ],
      currentVersion: 'Model 3',
    });
  });
});
