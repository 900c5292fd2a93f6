import { defineConfig, UserConfig } from 'vite'
import react from '@vitejs/plugin-react'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'
import { viteStaticCopy } from 'vite-plugin-static-copy'

const root = dirname(fileURLToPath(import.meta.url))
const buildTarget = process.env.BUILD_TARGET // 'content' | 'popup' | undefined (background)

/**
 * Three builds share one dist/ folder:
 * - background.js: MV3 service worker (ES module), runs first and clears dist/
 * - content.js: self-contained IIFE, content scripts cannot load modules
 * - popup: React page
 */
export default defineConfig(({ mode }): UserConfig => {
  const define = {
    'process.env.NODE_ENV': JSON.stringify(mode),
    __DEV__: JSON.stringify(mode === 'development'),
  }

  const baseConfig: UserConfig = {
    define,
    plugins: [react()],
    build: {
      outDir: 'dist',
      emptyOutDir: !buildTarget,
      sourcemap: process.env.NODE_ENV === 'development' ? 'inline' : false,
      minify: process.env.NODE_ENV === 'development' ? false : 'esbuild'
    }
  }

  /** CONTENT SCRIPT BUILD */
  if (buildTarget === 'content') {
    return {
      ...baseConfig,
      build: {
        ...baseConfig.build,
        lib: {
          entry: resolve(root, 'src/content/index.ts'),
          name: 'DistillContent',
          formats: ['iife'],
          fileName: () => 'content.js'
        },
        rollupOptions: {
          output: {
            format: 'iife',
            inlineDynamicImports: true
          }
        }
      }
    }
  }

  /** POPUP BUILD */
  if (buildTarget === 'popup') {
    return {
      ...baseConfig,
      build: {
        ...baseConfig.build,
        rollupOptions: {
          input: {
            popup: resolve(root, 'src/popup/index.html')
          },
          output: {
            entryFileNames: 'popup/assets/[name]-[hash].js',
            chunkFileNames: 'popup/assets/[name]-[hash].js',
            assetFileNames: 'popup/assets/[name]-[hash][extname]'
          }
        }
      }
    }
  }

  // DEFAULT BUILD: background service worker, plus the manifest and icons
  return {
    ...baseConfig,
    plugins: [
      react(),
      viteStaticCopy({
        targets: [
          { src: 'public/manifest.json', dest: '.' }
        ],
        hook: 'writeBundle'
      })
    ],
    build: {
      ...baseConfig.build,
      rollupOptions: {
        input: {
          background: resolve(root, 'src/background/index.ts')
        },
        output: {
          entryFileNames: '[name].js',
          chunkFileNames: 'assets/[name]-[hash].js',
          assetFileNames: 'assets/[name]-[hash][extname]'
        }
      }
    }
  }
})
