/**
 * Control endpoint checks over the browser's HTTP discovery interface.
 */

/** True when `GET {endpoint}/json/version` answers 2xx within `timeoutMs`. */
export async function checkEndpoint(endpoint: string, timeoutMs: number): Promise<boolean> {
  try {
    const res = await fetch(`${endpoint}/json/version`, { signal: AbortSignal.timeout(timeoutMs) })
    return res.ok
  } catch {
    return false
  }
}

/** Resolve the browser-level WebSocket URL advertised by the endpoint. */
export async function discoverWsEndpoint(endpoint: string, timeoutMs: number): Promise<string> {
  const res = await fetch(`${endpoint}/json/version`, { signal: AbortSignal.timeout(timeoutMs) })
  if (!res.ok) {
    throw new Error(`CDP version endpoint returned ${res.status}`)
  }
  const data: unknown = await res.json()
  if (
    typeof data !== "object" ||
    data === null ||
    !("webSocketDebuggerUrl" in data) ||
    typeof data.webSocketDebuggerUrl !== "string" ||
    !/^wss?:\/\//.test(data.webSocketDebuggerUrl)
  ) {
    throw new Error("No webSocketDebuggerUrl in CDP /json/version response")
  }
  return data.webSocketDebuggerUrl
}
