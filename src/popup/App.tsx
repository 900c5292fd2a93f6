import { useState, useEffect } from 'react'
import { ReducePanel } from './components/ReducePanel'
import { useSettingsStore } from '../lib/stores/settings.store'
import { createLogger } from '../lib/core/debug'

const log = createLogger('Popup')

// Hydration gate: settings are persisted with skipHydration
function useHydration() {
  const [hydrated, setHydrated] = useState(() => useSettingsStore.persist.hasHydrated())

  useEffect(() => {
    const unsub = useSettingsStore.persist.onFinishHydration(() => {
      log.log('Settings store hydrated')
      setHydrated(true)
    })

    // Fast hydration may have finished before the subscription
    if (useSettingsStore.persist.hasHydrated()) setHydrated(true)

    return unsub
  }, [])

  return hydrated
}

export function App() {
  const hydrated = useHydration()

  if (!hydrated) {
    return (
      <div className="w-[360px] h-[520px] flex items-center justify-center" style={{ background: 'rgba(20, 20, 20, 0.95)' }}>
        <div className="text-center space-y-3">
          <div className="relative w-12 h-12 mx-auto">
            <div className="absolute inset-0 rounded-full border-2 border-white/20"></div>
            <div className="absolute inset-0 rounded-full border-2 border-white border-t-transparent animate-spin"></div>
          </div>
          <p className="text-sm font-semibold text-white">Loading settings...</p>
        </div>
      </div>
    )
  }

  return (
    <div className="w-[360px] h-[520px]" style={{ background: 'rgba(20, 20, 20, 0.95)' }}>
      <ReducePanel />
    </div>
  )
}
