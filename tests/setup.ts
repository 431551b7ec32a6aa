import { beforeEach } from 'vitest';

// Keep the developer's MIMIC_* environment out of config resolution
beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('MIMIC_')) delete process.env[key];
  }
});
