import { readFileSync, readdirSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = dirname(fileURLToPath(import.meta.url));
const packagesDir = resolve(rootDir, 'packages');

const baseTestConfig = {
  setupFiles: [resolve(rootDir, 'helpers/tests/console-guard.ts')],
  include: ['test/**/*.test.ts'],
};

const packageProjects = readdirSync(packagesDir, { withFileTypes: true })
  .filter((entry) => entry.isDirectory())
  .map((entry) => {
    const root = resolve(packagesDir, entry.name);
    const packageJson: { name?: string } = JSON.parse(
      readFileSync(resolve(root, 'package.json'), 'utf8'),
    );

    return {
      root,
      test: {
        ...baseTestConfig,
        name: packageJson.name ?? entry.name,
      },
    };
  });

export default defineConfig({
  test: {
    projects: packageProjects,
  },
});
