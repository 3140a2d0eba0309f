export function createAbortError(): DOMException {
  return new DOMException("Aborted", "AbortError")
}

export function isAbortError(err: unknown): err is DOMException {
  return err instanceof DOMException && err.name === "AbortError"
}
