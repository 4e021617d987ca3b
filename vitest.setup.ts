/**
 * Vitest Global Setup
 *
 * Keeps the developer's own TASKLINE_* settings out of the tests.
 */
for (const key of Object.keys(process.env)) {
  if (key.startsWith("TASKLINE_")) {
    delete process.env[key];
  }
}
