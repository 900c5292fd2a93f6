import { useState } from 'react'
import { motion, AnimatePresence } from 'framer-motion'
import { AlertCircle, Check, Info, Loader2, RefreshCw, RotateCcw, Scissors, Square } from 'lucide-react'
import { Button, Input, Textarea } from '../../lib/components'
import { cn } from '../../lib/design/utils'
import { REDUCTION } from '../../lib/config/constants'
import { resolveCustomPrompt } from '../../lib/reduction/prompts'
import { useSettingsStore } from '../../lib/stores/settings.store'
import { usePageReduction, type StatusKind } from '../hooks/usePageReduction'
import { useServerStatus } from '../hooks/useServerStatus'

const STATUS_ICONS: Record<StatusKind, typeof Check> = {
  success: Check,
  error: AlertCircle,
  info: Info,
}

const STATUS_COLORS: Record<StatusKind, string> = {
  success: 'text-success',
  error: 'text-error',
  info: 'text-white/70',
}

export function ReducePanel() {
  const reductionLevel = useSettingsStore((s) => s.reductionLevel)
  const setReductionLevel = useSettingsStore((s) => s.setReductionLevel)
  const customPrompt = useSettingsStore((s) => s.customPrompt)
  const setCustomPrompt = useSettingsStore((s) => s.setCustomPrompt)
  const serverUrl = useSettingsStore((s) => s.serverUrl)
  const setServerUrl = useSettingsStore((s) => s.setServerUrl)

  const [serverDraft, setServerDraft] = useState(serverUrl)
  const { status: server, recheck } = useServerStatus(serverUrl)
  const { status, progress, message, reduce, cancel, restore } = usePageReduction()

  const state = status?.state ?? null
  const running = state === 'running' || state === 'cancelling'
  const serverOnline = !server.checking && server.online
  const progressPct = progress && progress.total > 0 ? Math.round((progress.current / progress.total) * 100) : 0

  function handleReduce() {
    void reduce(reductionLevel, resolveCustomPrompt(customPrompt, reductionLevel))
  }

  function commitServerUrl(value: string) {
    setServerUrl(value)
    setServerDraft(useSettingsStore.getState().serverUrl)
  }

  const StatusIcon = message ? STATUS_ICONS[message.kind] : null

  return (
    <div className="flex flex-col h-full" style={{ background: 'rgba(20, 20, 20, 0.95)' }}>
      {/* Header */}
      <div className="px-4 py-3 border-b border-white/10 flex items-center justify-between">
        <div>
          <h2 className="text-lg font-semibold text-white">Distill</h2>
          <p className="text-xs text-white/50">Reduce this page to its essentials</p>
        </div>
        <button
          onClick={recheck}
          title={server.checking ? 'Checking server...' : server.online ? `Server online${server.model ? ` (${server.model})` : ''}` : server.error}
          className="flex items-center gap-1.5 text-xs text-white/60 hover:text-white/90 transition-colors"
        >
          <span
            className={cn(
              'w-2 h-2 rounded-full',
              server.checking ? 'bg-white/40 animate-pulse' : server.online ? 'bg-success' : 'bg-error'
            )}
          />
          {server.checking ? 'Checking' : server.online ? 'Online' : 'Offline'}
        </button>
      </div>

      <div className="flex-1 overflow-y-auto p-4 space-y-4">
        {!server.checking && !server.online && (
          <p className="text-xs text-error" role="alert">
            {server.error}
          </p>
        )}

        {/* Reduction level */}
        <div className="space-y-2">
          <div className="flex items-center justify-between">
            <label htmlFor="reduction-level" className="text-sm font-medium text-white">
              Reduction level
            </label>
            <span className="text-sm font-mono text-white/80">{reductionLevel}%</span>
          </div>
          <input
            id="reduction-level"
            type="range"
            min={REDUCTION.MIN_LEVEL}
            max={REDUCTION.MAX_LEVEL}
            step={REDUCTION.LEVEL_STEP}
            value={reductionLevel}
            disabled={running}
            onChange={(e) => setReductionLevel(Number(e.target.value))}
            className="w-full accent-white"
          />
          <p className="text-xs text-white/50">Share of the original length to keep</p>
        </div>

        {/* Custom prompt */}
        <div className="space-y-2">
          <label htmlFor="custom-prompt" className="text-sm font-medium text-white">
            Custom instruction
          </label>
          <Textarea
            id="custom-prompt"
            rows={4}
            value={customPrompt}
            disabled={running}
            placeholder={`Leave empty for the default. ${REDUCTION.LEVEL_PLACEHOLDER} is replaced with the level.`}
            onChange={(e) => setCustomPrompt(e.target.value)}
          />
        </div>

        {/* Server */}
        <div className="space-y-2">
          <label htmlFor="server-url" className="text-sm font-medium text-white">
            Server URL
          </label>
          <Input
            id="server-url"
            type="url"
            value={serverDraft}
            onChange={(e) => setServerDraft(e.target.value)}
            onCommit={commitServerUrl}
          />
        </div>

        {/* Progress */}
        <AnimatePresence>
          {running && (
            <motion.div
              initial={{ opacity: 0, y: 8 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -8 }}
              transition={{ duration: 0.2, ease: 'easeOut' }}
              className="space-y-1.5"
            >
              <div className="flex items-center gap-2 text-xs text-white/70">
                <Loader2 size={12} className="animate-spin" />
                <span>{progress?.message ?? 'Starting...'}</span>
              </div>
              <div className="h-1 rounded-full bg-white/15 overflow-hidden">
                <motion.div
                  className="h-full bg-white/85"
                  animate={{ width: `${progressPct}%` }}
                  transition={{ duration: 0.2, ease: 'easeOut' }}
                />
              </div>
            </motion.div>
          )}
        </AnimatePresence>

        {message && StatusIcon && (
          <div className={cn('flex items-center gap-1.5 text-xs', STATUS_COLORS[message.kind])} role="status">
            <StatusIcon size={12} />
            <span>{message.text}</span>
          </div>
        )}

        {status?.isReduced && (
          <p className="text-xs text-white/50">
            {status.originalWords} → {status.reducedWords} words
          </p>
        )}
      </div>

      {/* Actions */}
      <div className="px-4 py-3 border-t border-white/10 flex gap-2">
        {running ? (
          <Button
            variant="secondary"
            className="flex-1 gap-1.5"
            disabled={state === 'cancelling'}
            onClick={() => void cancel()}
          >
            <Square size={14} />
            {state === 'cancelling' ? 'Cancelling...' : 'Cancel'}
          </Button>
        ) : (
          <Button
            className="flex-1 gap-1.5"
            disabled={state !== 'idle' || !serverOnline}
            onClick={handleReduce}
          >
            <Scissors size={14} />
            Reduce page
          </Button>
        )}
        <Button
          variant="secondary"
          className="flex-1 gap-1.5"
          disabled={state === null || running}
          onClick={() => void restore()}
        >
          <RotateCcw size={14} />
          Restore
        </Button>
        <Button variant="icon" title="Recheck server" onClick={recheck}>
          <RefreshCw size={14} />
        </Button>
      </div>
    </div>
  )
}
