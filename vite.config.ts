import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

// https://vitejs.dev/config/
export default defineConfig(({ mode }) => {
  // Load env file based on `mode` in the current working directory.
  const env = loadEnv(mode, '.', '');
  // Prefer API_KEY, fall back to GEMINI_API_KEY
  const apiKey = env.API_KEY || env.GEMINI_API_KEY || '';

  return {
    plugins: [react()],
    build: {
      outDir: 'dist',
      sourcemap: true
    },
    define: {
      // Only these literals are replaced; there is no `process` in the browser
      'process.env.API_KEY': JSON.stringify(apiKey),
      'process.env.GEMINI_API_KEY': JSON.stringify(apiKey),
      'process.env.GEMINI_MODEL': JSON.stringify(env.GEMINI_MODEL || ''),
      'process.env.GEMINI_TEMPERATURE': JSON.stringify(env.GEMINI_TEMPERATURE || ''),
      'process.env.GEMINI_TOP_P': JSON.stringify(env.GEMINI_TOP_P || ''),
      'process.env.GEMINI_TOP_K': JSON.stringify(env.GEMINI_TOP_K || ''),
      'process.env.GEMINI_MAX_OUTPUT_TOKENS': JSON.stringify(env.GEMINI_MAX_OUTPUT_TOKENS || '')
    }
  };
});
