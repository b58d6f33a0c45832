import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'bin/payments': 'src/bin/payments.ts',
  },
  format: ['esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  treeshake: true,
  external: ['express', 'mongoose', 'axios', 'pino'],
  esbuildOptions(options) {
    options.banner = {
      js: '/* a2a-points - points payments between agents */',
    };
  },
});
