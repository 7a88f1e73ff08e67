/**
 * Vitest Global Setup
 *
 * Keeps cache configuration from the developer's shell out of the tests.
 */
import { beforeEach } from "vitest";

const ENV_PREFIX = "RECENCY_";

beforeEach(() => {
  for (const name of Object.keys(process.env)) {
    if (name.startsWith(ENV_PREFIX)) {
      delete process.env[name];
    }
  }
});
