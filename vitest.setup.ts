/**
 * Vitest Global Setup
 *
 * Keeps CACHET_* variables from the developer's shell out of config tests.
 */
for (const name of Object.keys(process.env)) {
  if (name.startsWith("CACHET_") && name !== "CACHET_LOG_LEVEL") {
    delete process.env[name];
  }
}

process.setMaxListeners(0);
