import type { Config } from 'tailwindcss'

export default {
  content: ['./src/popup/**/*.{html,tsx}', './src/lib/components/**/*.tsx'],
  theme: {
    extend: {
      colors: {
        success: '#4ade80',
        error: '#f87171',
        info: '#60a5fa',
      },
    },
  },
  plugins: [],
} satisfies Config
