import { describe, expect, it } from 'vitest';

import { createSpecificationRunner } from '../src/core/specificationRunner.js';
import type { RunState } from '../src/core/specificationRunner.js';
import { InvalidSpecificationError } from '../src/schema/index.js';
import type { SpecificationInput } from '../src/schema/index.js';
import { FakeDriver, hangingGoto, headlessLinux, recordingSleep } from './fakes/driver.js';
import type { FakeDriverOptions } from './fakes/driver.js';

function setup(options: FakeDriverOptions = {}) {
  const driver = new FakeDriver(options);
  const states: RunState[] = [];
  const runner = createSpecificationRunner({
    driver,
    capabilities: headlessLinux,
    sleep: recordingSleep().sleep,
    onStateChange: (state) => states.push(state),
  });
  return { driver, runner, states };
}

const searchSpec: SpecificationInput = {
  feature: { name: 'Search' },
  scenarios: [
    {
      id: 'rain',
      name: 'Search for rain',
      given: [{ type: 'navigate', url: 'https://example.com', waitUntil: 'domcontentloaded' }],
      when: [{ type: 'fill', locator: '#q', text: 'rain' }],
      then: [{ type: 'assert_visible', locator: '#results' }],
    },
  ],
};

describe('SpecificationRunner', () => {
  it('runs a passing specification end to end', async () => {
    const { driver, runner } = setup({
      page: { isVisible: (locator) => Promise.resolve(locator === '#results') },
    });

    const result = await runner.run(searchSpec);

    expect(result.summary).toEqual({ total: 1, passed: 1, failed: 0, passRate: '100.00%' });
    expect(result.status).toBe('passed');
    expect(result.error).toBeUndefined();
    expect(result.feature).toEqual({ name: 'Search', tags: [] });
    expect(result.configuration).toEqual({ browser: 'chromium', headless: true, timeoutMs: 30_000 });
    expect(driver.browsers[0]?.closeCalls).toBe(1);
  });

  it('walks the run through its states', async () => {
    const { runner, states } = setup();

    await runner.run(searchSpec);

    expect(states).toEqual(['created', 'browser_launching', 'running', 'finalizing', 'done']);
  });

  it('aggregates mixed scenario outcomes', async () => {
    const { runner } = setup({
      page: {
        goto: (url) =>
          url.includes('broken')
            ? Promise.reject(new Error('net::ERR_CONNECTION_REFUSED'))
            : Promise.resolve({ status: 200 }),
      },
    });

    const result = await runner.run({
      feature: { name: 'Catalogue' },
      scenarios: [
        { id: 'ok', name: 'Home', given: [{ type: 'navigate', url: 'https://example.com/' }] },
        {
          id: 'bad',
          name: 'Broken page',
          given: [{ type: 'navigate', url: 'https://example.com/broken', maxRetries: 1 }],
        },
      ],
    });

    expect(result.scenarios.map((s) => s.status)).toEqual(['passed', 'failed']);
    expect(result.summary).toEqual({ total: 2, passed: 1, failed: 1, passRate: '50.00%' });
    expect(result.status).toBe('partial');
  });

  it('keeps partial scenarios out of the failed count', async () => {
    const { runner } = setup({
      page: { isVisible: (locator) => Promise.resolve(locator === '#a') },
    });

    const result = await runner.run({
      feature: { name: 'Widgets' },
      scenarios: [
        {
          id: 'widgets',
          name: 'Widgets render',
          then: [
            { type: 'assert_visible', locator: '#a' },
            { type: 'assert_visible', locator: '#b' },
          ],
        },
      ],
    });

    expect(result.scenarios[0]?.status).toBe('partial');
    expect(result.summary).toEqual({ total: 1, passed: 0, failed: 0, passRate: '0.00%' });
    expect(result.status).toBe('passed');
  });

  it('fails a run whose browser dies during the Then phase', async () => {
    const { runner } = setup({
      page: { isVisible: () => Promise.reject(new Error('Target page, context or browser has been closed')) },
    });

    const result = await runner.run(searchSpec);

    expect(result.scenarios[0]?.status).toBe('failed');
    expect(result.scenarios[0]?.error?.kind).toBe('browser_disconnected');
    expect(result.summary).toEqual({ total: 1, passed: 0, failed: 1, passRate: '0.00%' });
    expect(result.status).toBe('failed');
  });

  it('returns a failed result when the browser cannot launch', async () => {
    const { runner, states } = setup({ launchError: new Error('Executable not found') });

    const result = await runner.run(searchSpec);

    expect(result.status).toBe('failed');
    expect(result.scenarios).toEqual([]);
    expect(result.summary).toEqual({ total: 0, passed: 0, failed: 0, passRate: '0%' });
    expect(result.error).toEqual({
      kind: 'browser_launch',
      message: 'Failed to initialize browser: Executable not found',
    });
    expect(states.at(-1)).toBe('done');
  });

  it('stops at the run ceiling and closes the browser', async () => {
    const { driver, runner } = setup({ page: { goto: hangingGoto } });

    const result = await runner.run(searchSpec, { runTimeoutMs: 50 });

    expect(result.status).toBe('failed');
    expect(result.scenarios).toEqual([]);
    expect(result.error).toEqual({
      kind: 'timeout',
      message: 'Run exceeded 0.05s ceiling during "Navigate to https://example.com"',
      location: { scenarioId: 'rain', phase: 'given', stepIndex: 0 },
    });
    expect(driver.page.closeCalls).toBe(1);
    expect(driver.browsers[0]?.closeCalls).toBe(1);
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    const { driver, runner } = setup({
      page: {
        goto: () => {
          controller.abort('stop requested');
          return hangingGoto();
        },
      },
    });

    const result = await runner.run(searchSpec, { signal: controller.signal });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ kind: 'cancelled', message: 'Run cancelled: stop requested' });
    expect(driver.browsers[0]?.closeCalls).toBe(1);
  });

  it('rejects a malformed specification before launching', async () => {
    const { driver, runner } = setup();

    await expect(
      runner.run({
        feature: { name: 'Broken' },
        scenarios: [{ id: 'x', name: 'x', given: [{ type: 'navigate', url: '' }] }],
      }),
    ).rejects.toBeInstanceOf(InvalidSpecificationError);
    expect(driver.launches).toEqual([]);
  });
});
