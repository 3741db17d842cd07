import { build } from 'esbuild';
import fs from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const CLI_PKG = path.resolve(__dirname, '..');
const OUT = path.resolve(CLI_PKG, 'dist');

const PackageJsonSchema = z.object({
  version: z.string(),
  dependencies: z.record(z.string(), z.string()).default({}),
});

// Version is injected into the binary; registry dependencies stay external.
const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(path.join(CLI_PKG, 'package.json'), 'utf-8')));
const external = Object.keys(pkg.dependencies).filter((name) => !name.startsWith('@fieldlink/'));

async function buildCLI(): Promise<void> {
  await fs.rm(OUT, { recursive: true, force: true });

  // Workspace packages are inlined from their TypeScript sources.
  console.log('Bundling CLI...');
  await build({
    entryPoints: [path.join(CLI_PKG, 'src/cli.ts')],
    bundle: true,
    platform: 'node',
    target: 'node20',
    format: 'esm',
    outfile: path.join(OUT, 'bin/cli.js'),
    external,
    define: { __CLI_VERSION__: JSON.stringify(pkg.version) },
    sourcemap: true,
    banner: { js: '#!/usr/bin/env node' },
  });

  await fs.chmod(path.join(OUT, 'bin/cli.js'), 0o755);
  console.log('Build complete.');
}

await buildCLI();
