import { beforeEach, afterEach } from 'vitest';

// Dev warnings are part of the contract under test, so pin a dev-like
// NODE_ENV regardless of the shell's value.
const BASE = 'development';

beforeEach(() => {
  process.env.NODE_ENV = BASE;
});

afterEach(() => {
  process.env.NODE_ENV = BASE;
});
