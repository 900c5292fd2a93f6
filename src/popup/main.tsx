import React from 'react'
import { createRoot } from 'react-dom/client'
import { App } from './App'
import { useSettingsStore } from '../lib/stores/settings.store'
import '../styles/tailwind.css'
import { createLogger } from '../lib/core/debug'

const log = createLogger('Popup')

// Rehydrate before rendering (required when skipHydration: true)
log.log('Rehydrating settings...')
Promise.resolve(useSettingsStore.persist.rehydrate()).catch((err: unknown) => log.error('Settings rehydration failed:', err))

const root = document.getElementById('root')
if (!root) throw new Error('Root element not found')

createRoot(root).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
)
