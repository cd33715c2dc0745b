import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime dependencies stay external; everything under the path aliases is bundled
const externalDependencies = ['chalk', 'tinyglobby', 'winston'];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const configureEsbuild = (options: EsbuildOptions): void => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@api': './api',
    '@cli': './cli'
  };
  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';
};

export default defineConfig([
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    esbuildOptions: configureEsbuild
  },
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions: configureEsbuild
  }
]);
