/**
 * Vitest Global Setup
 *
 * Resets the config cache so vi.stubEnv() values set at file level, in
 * beforeAll or inside a test are picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
