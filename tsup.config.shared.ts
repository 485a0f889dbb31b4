import type { Options } from 'tsup';

const sharedConfig: Options = {
  outDir: 'dist',
  dts: true,
  format: ['esm', 'cjs'],
  target: 'node20',
  clean: true,
};

export default sharedConfig;
