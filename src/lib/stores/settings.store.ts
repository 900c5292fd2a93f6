import { create } from 'zustand'
import { persist, createJSONStorage } from 'zustand/middleware'
import { debouncedChromeStorage } from '../core/zustandChromeStorage'
import { createLogger } from '../core/debug'
import { REDUCTION, SERVER, STORAGE_KEYS } from '../config/constants'
import { clampReductionLevel } from '../reduction/prompts'
import { normalizeServerUrl } from '../reduction/client'

const log = createLogger('Settings')

export interface SettingsState {
  reductionLevel: number  // 5-80, percent of the original length
  customPrompt: string    // empty = default instruction
  serverUrl: string
  setReductionLevel: (level: number) => void
  setCustomPrompt: (prompt: string) => void
  setServerUrl: (url: string) => void
  resetSettings: () => void
}

const DEFAULTS = {
  reductionLevel: REDUCTION.DEFAULT_LEVEL,
  customPrompt: '',
  serverUrl: SERVER.DEFAULT_URL,
}

export const useSettingsStore = create<SettingsState>()(
  persist(
    (set) => ({
      ...DEFAULTS,
      setReductionLevel: (level) => set({ reductionLevel: clampReductionLevel(level) }),
      setCustomPrompt: (prompt) => set({ customPrompt: prompt }),
      setServerUrl: (url) => set({ serverUrl: normalizeServerUrl(url) }),
      resetSettings: () => set({ ...DEFAULTS }),
    }),
    {
      name: STORAGE_KEYS.SETTINGS,
      version: 1,
      storage: createJSONStorage(() => debouncedChromeStorage),
      skipHydration: true,
      partialize: (state) => ({
        reductionLevel: state.reductionLevel,
        customPrompt: state.customPrompt,
        serverUrl: state.serverUrl,
      }),
      onRehydrateStorage: () => {
        log.log('Hydration starts')
        return (state, error) => {
          if (error) {
            log.error('Hydration failed:', error)
            return
          }
          if (!state) return

          /** Validate and fix bounds on rehydration */
          const clamped = clampReductionLevel(state.reductionLevel)
          if (clamped !== state.reductionLevel) {
            log.warn('Fixed out-of-bounds reduction level on rehydration:', { from: state.reductionLevel, to: clamped })
            state.setReductionLevel(clamped)
          }
          if (typeof state.customPrompt !== 'string') {
            state.setCustomPrompt('')
          }
          if (typeof state.serverUrl !== 'string' || normalizeServerUrl(state.serverUrl) !== state.serverUrl) {
            state.setServerUrl(typeof state.serverUrl === 'string' ? state.serverUrl : '')
          }
          log.log('Hydration finished successfully')
        }
      },
    }
  )
)
