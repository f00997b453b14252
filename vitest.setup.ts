/**
 * Vitest Global Setup
 *
 * Clears TREESCAN_* variables inherited from the shell so that configuration
 * tests only see what they pass in.
 */

for (const key of Object.keys(process.env)) {
  if (key.startsWith("TREESCAN_")) {
    delete process.env[key];
  }
}

process.setMaxListeners(0);
