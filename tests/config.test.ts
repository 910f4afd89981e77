import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resolveRunSettings } from '../src/cli/run.js';
import { detectCapabilities } from '../src/config/capabilities.js';
import { loadEnvConfig } from '../src/config/env.js';
import { loadConfigFile, loadSpecificationFile } from '../src/config/loader.js';
import { InvalidSpecificationError, parseSpecification } from '../src/schema/index.js';

describe('detectCapabilities', () => {
  it('needs a display server on Linux', () => {
    expect(detectCapabilities({}, 'linux').displayAvailable).toBe(false);
    expect(detectCapabilities({ DISPLAY: '' }, 'linux').displayAvailable).toBe(false);
    expect(detectCapabilities({ DISPLAY: ':0' }, 'linux').displayAvailable).toBe(true);
    expect(detectCapabilities({ WAYLAND_DISPLAY: 'wayland-0' }, 'linux').displayAvailable).toBe(true);
  });

  it('assumes a display elsewhere', () => {
    expect(detectCapabilities({}, 'darwin')).toEqual({ displayAvailable: true, platform: 'darwin' });
    expect(detectCapabilities({}, 'win32').displayAvailable).toBe(true);
  });
});

describe('loadEnvConfig', () => {
  it('parses flags and numbers', () => {
    expect(
      loadEnvConfig({
        SPECRUN_BROWSER: 'firefox',
        SPECRUN_HEADLESS: '0',
        SPECRUN_RUN_TIMEOUT: '90',
        SPECRUN_RESULTS_DIR: 'out',
      }),
    ).toEqual({
      SPECRUN_BROWSER: 'firefox',
      SPECRUN_HEADLESS: false,
      SPECRUN_RUN_TIMEOUT: 90,
      SPECRUN_RESULTS_DIR: 'out',
    });
  });

  it('ignores unset variables', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  it('rejects unknown browsers', () => {
    expect(() => loadEnvConfig({ SPECRUN_BROWSER: 'netscape' })).toThrow();
  });
});

describe('config and specification files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'specrun-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('treats a missing config file as empty', async () => {
    expect(await loadConfigFile(path.join(dir, '.specrun.yaml'))).toEqual({});
  });

  it('reads a YAML config file', async () => {
    const file = path.join(dir, '.specrun.yaml');
    await writeFile(file, 'browser: webkit\nheadless: false\nrunTimeout: 120\n');

    expect(await loadConfigFile(file)).toEqual({ browser: 'webkit', headless: false, runTimeout: 120 });
  });

  it('rejects an invalid config file', async () => {
    const file = path.join(dir, 'specrun.json');
    await writeFile(file, '{"runTimeout": -5}');

    await expect(loadConfigFile(file)).rejects.toThrow();
  });

  it('loads a YAML specification with defaults applied', async () => {
    const file = path.join(dir, 'search.yaml');
    await writeFile(
      file,
      [
        'feature:',
        '  name: Search',
        'scenarios:',
        '  - id: rain',
        '    name: Search for rain',
        '    given:',
        '      - type: navigate',
        '        url: https://example.com',
        '    then:',
        '      - type: assert_cart_count',
        '        expected: gt0',
        '',
      ].join('\n'),
    );

    const spec = await loadSpecificationFile(file);

    expect(spec.configuration).toEqual({ browser: 'chromium', headless: true, timeoutMs: 30_000 });
    expect(spec.scenarios[0]?.given[0]).toEqual({
      type: 'navigate',
      url: 'https://example.com',
      waitUntil: 'domcontentloaded',
      timeoutMs: 60_000,
      maxRetries: 2,
    });
    expect(spec.scenarios[0]?.then[0]).toEqual({
      type: 'assert_cart_count',
      expected: 'gt0',
      locator: '#nav-cart-count',
    });
    expect(spec.scenarios[0]?.when).toEqual([]);
  });

  it('rejects a specification file with an unknown step', async () => {
    const file = path.join(dir, 'bad.json');
    await writeFile(
      file,
      JSON.stringify({
        feature: { name: 'Bad' },
        scenarios: [{ id: 'x', name: 'x', when: [{ type: 'teleport' }] }],
      }),
    );

    await expect(loadSpecificationFile(file)).rejects.toBeInstanceOf(InvalidSpecificationError);
  });
});

describe('resolveRunSettings', () => {
  const spec = parseSpecification({ feature: { name: 'Search' }, scenarios: [] });

  it('prefers the config file over the environment over the specification', () => {
    const resolved = resolveRunSettings(
      spec,
      { config: '.specrun.yaml' },
      { browser: 'webkit' },
      loadEnvConfig({ SPECRUN_BROWSER: 'firefox', SPECRUN_HEADLESS: 'false', SPECRUN_RUN_TIMEOUT: '120' }),
    );

    expect(resolved).toEqual({
      configuration: { browser: 'webkit', headless: false, timeoutMs: 30_000 },
      resultsDir: path.resolve('results'),
      runTimeoutMs: 120_000,
    });
  });

  it('lets flags override everything', () => {
    const resolved = resolveRunSettings(
      spec,
      { config: '.specrun.yaml', browser: 'chromium', headless: true, runTimeout: '30', resultsDir: 'out' },
      { browser: 'webkit', headless: false, runTimeout: 600, resultsDir: 'elsewhere' },
      loadEnvConfig({}),
    );

    expect(resolved).toEqual({
      configuration: { browser: 'chromium', headless: true, timeoutMs: 30_000 },
      resultsDir: path.resolve('out'),
      runTimeoutMs: 30_000,
    });
  });

  it('uses the default ceiling when nothing sets one', () => {
    const resolved = resolveRunSettings(spec, { config: '.specrun.yaml', headed: true }, {}, {});

    expect(resolved.runTimeoutMs).toBe(300_000);
    expect(resolved.configuration.headless).toBe(false);
  });

  it('rejects an unknown browser flag', () => {
    expect(() =>
      resolveRunSettings(spec, { config: '.specrun.yaml', browser: 'netscape' }, {}, {}),
    ).toThrow();
  });
});
