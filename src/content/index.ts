import { createLogger } from '../lib/core/debug'
import { isExtensionContextValid, notify } from '../lib/core/messaging'
import { createRuntimeReductionClient } from '../lib/reduction/client'
import type { ReduceProgressMessage } from '../types'
import { PageIndicators } from './indicators'
import { createContentMessageHandler } from './messageHandler'
import { PageReducer } from './reducer'

const log = createLogger('Content')

const reducer = new PageReducer({
  root: document.body,
  client: createRuntimeReductionClient(),
})
const indicators = new PageIndicators(document)

reducer.on('state', (state) => {
  switch (state) {
    case 'running':
      indicators.hideBadge()
      indicators.showLoading(() => {
        if (reducer.getStatus().state === 'running') reducer.cancel()
      })
      break
    case 'cancelling':
      indicators.markCancelling()
      break
    case 'reduced':
      indicators.hideLoading()
      indicators.showBadge()
      break
    case 'idle':
      indicators.hideLoading()
      indicators.hideBadge()
      break
  }
})

reducer.on('progress', (progress) => {
  indicators.updateProgress(progress)
  if (!isExtensionContextValid()) return
  const message: ReduceProgressMessage = { type: 'REDUCE_PROGRESS', payload: progress }
  notify(message)
})

chrome.runtime.onMessage.addListener(createContentMessageHandler(reducer))

log.log('Content script ready')
