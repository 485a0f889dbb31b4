import { defineConfig } from 'tsup';
import sharedConfig from '../../tsup.config.shared.js';

export default defineConfig({
  entry: ['src/index.ts'],
  ...sharedConfig,
});
