import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// Serves the demo page in index.html
export default defineConfig({
  plugins: [react()],
  server: {
    port: 5173,
    host: true,
  },
  preview: {
    port: 5173,
    host: true,
  },
})
