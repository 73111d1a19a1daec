// vite.config.ts
import { defineConfig } from 'vite'
import { VitePWA } from 'vite-plugin-pwa'

export default defineConfig({
  plugins: [
    VitePWA({
      // auto register SW + update when new build is available
      registerType: 'autoUpdate',
      devOptions: { enabled: true },
      // map layouts live in /public and must be available offline
      includeAssets: ['maps/*.json'],
      workbox: {
        globPatterns: ['**/*.{js,css,html,json}']
      },
      manifest: {
        name: 'Tile Breaker',
        short_name: 'Tile Breaker',
        start_url: '.',
        scope: '.',
        display: 'standalone',
        background_color: '#1b2630',
        theme_color: '#1b2630'
      }
    })
  ],
  server: { port: 5173, open: true },
  build: { sourcemap: true }
})
