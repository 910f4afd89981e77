import { BrowserSession } from '../src/browser/session.js';
import { runConfigurationSchema } from '../src/schema/index.js';
import { FakeDriver, headlessLinux, recordingSleep } from './fakes/driver.js';
import type { FakeDriverOptions } from './fakes/driver.js';

/** A session already launched against a fake driver. */
export async function launchedSession(options: FakeDriverOptions = {}) {
  const driver = new FakeDriver(options);
  const session = new BrowserSession({
    driver,
    capabilities: headlessLinux,
    sleep: recordingSleep().sleep,
  });
  await session.launch(runConfigurationSchema.parse({}));
  return { driver, session };
}
