/**
 * Tolerant reads of persisted JSON. Corrupted or unexpected storage data
 * yields undefined instead of throwing.
 */

function parseOrUndefined(json: string): unknown {
  try {
    const result: unknown = JSON.parse(json)
    return result
  } catch {
    return undefined
  }
}

/**
 * Safely extract a nested property from a JSON string or an already parsed value.
 * Useful for reading state persisted by the zustand persist middleware, which
 * chrome.storage may hand back either serialized or as an object.
 *
 * @param path - Dot-separated path to the property (e.g., 'state.serverUrl')
 */
export function safeJsonExtract(source: unknown, path: string): unknown {
  const parsed = typeof source === 'string' ? parseOrUndefined(source) : source
  let result: unknown = parsed

  for (const key of path.split('.')) {
    if (result == null || typeof result !== 'object') {
      return undefined
    }
    result = Reflect.get(result, key)
  }

  return result
}
