/*
 * Script to build distributable bundles (ESM, CJS and a browser IIFE).
 * Type declarations come from `npm run build` (tsc).
 *
 * Hint: Don't use top level await here since this will cause the debugger to
 * hang on exit.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { build, type BuildOptions } from 'esbuild';
import { glob } from 'glob';

/**
 * Whether this is a production build.
 */
const prod = process.env.NODE_ENV === 'production';

/**
 * Base dir of the project.
 */
const baseDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..');

/**
 * Common build options.
 */
const buildOptions: BuildOptions = {
  absWorkingDir: baseDir,
  outbase: './src',
  platform: 'neutral',
  sourcemap: true,
  target: 'node20',
  metafile: true,
};

/**
 * Do the build.
 */
async function doBuild (): Promise<void> {
  process.stdout.write(`Doing ${prod ? 'production' : 'development'} bundle build ... `);
  const startTime = Date.now();

  const entryPoints = await glob('./src/**/*.ts', { cwd: baseDir });

  const [ esmResult, cjsResult, browserResult ] = await Promise.all([
    build({
      ...buildOptions,
      entryPoints,
      outdir: './dist/esm',
      format: 'esm',
    }),
    build({
      ...buildOptions,
      entryPoints,
      outdir: './dist/cjs',
      format: 'cjs',
    }),
    build({
      ...buildOptions,
      entryPoints: [ './src/index.ts' ],
      outfile: './dist/browser/whisker.min.js',
      bundle: true,
      minify: prod,
      format: 'iife',
      platform: 'browser',
      target: 'es2022',
      globalName: 'whisker',
      sourcemap: false,
    }),
  ]);

  await Promise.all([
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaEsm.json'), JSON.stringify(esmResult.metafile, undefined, 2)),
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaCjs.json'), JSON.stringify(cjsResult.metafile, undefined, 2)),
    fs.promises.writeFile(path.join(baseDir, 'dist', 'metaBrowser.json'), JSON.stringify(browserResult.metafile, undefined, 2)),
  ]);

  // Ensure Node treats dist/cjs/*.js as CommonJS even though the package root is type=module.
  await fs.promises.writeFile(
    path.join(baseDir, 'dist', 'cjs', 'package.json'),
    JSON.stringify({ type: 'commonjs' }, undefined, 2) + '\n',
  );

  const duration = Date.now() - startTime;
  process.stdout.write(`Build done in ${(duration / 1000).toFixed(2)}s\n`);
}

doBuild().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
