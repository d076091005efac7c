import { defineConfig } from 'tsup';
import { execSync } from 'node:child_process';

function getGitCommit(): string {
  try {
    return execSync('git rev-parse --short HEAD', { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
  } catch {
    return 'unknown';
  }
}

// Single-file CLI bundle; `npm run build` (tsc) is the unbundled build.
export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  outDir: 'bundle',
  sourcemap: true,
  clean: true,
  splitting: false,
  define: {
    '__BUILD_COMMIT__': JSON.stringify(getGitCommit()),
    '__BUILD_DATE__': JSON.stringify(new Date().toISOString().slice(0, 10)),
  },
});
