function timestamp(): string {
  return new Date().toISOString().split('T')[1]?.split('.')[0] ?? ''
}

export function log(message: string) {
  console.log(`[${timestamp()}] ${message}`)
}

export function logError(message: string, error: unknown) {
  console.error(`[${timestamp()}] ${message}`, error)
}
