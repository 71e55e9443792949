/**
 * Vitest Global Setup
 *
 * Resets the config cache before every test so tests can use
 * vi.stubEnv() and have the change picked up on the next getConfig() call.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
