import type { Config } from 'tailwindcss';

const config: Config = {
  content: [
    './components/**/*.{js,ts,jsx,tsx,mdx}',
    './app/**/*.{js,ts,jsx,tsx,mdx}',
  ],
  theme: {
    extend: {
      colors: {
        'brutal-black': '#0a0a0a',
        'brutal-dark': '#141414',
        'brutal-field': '#1e1e1e',
        'electric-yellow': '#e4ff1a',
        'electric-pink': '#ff2d6a',
        'electric-cyan': '#00f0ff',
        'electric-green': '#39ff14',
        'electric-orange': '#ff6b1a',
      },
      fontFamily: {
        display: ['var(--font-display)'],
        mono: ['var(--font-mono)'],
      },
    },
  },
  plugins: [],
};

export default config;
