export function parsePositiveInteger(
  value: string,
  errorMessage: string,
): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(errorMessage)
  }
  return parsed
}

export function parseOptionalPositiveInteger(
  value: string | undefined,
  defaultValue: number,
  errorMessage: string,
): number
export function parseOptionalPositiveInteger(
  value: string | undefined,
  defaultValue: null,
  errorMessage: string,
): number | null
export function parseOptionalPositiveInteger(
  value: string | undefined,
  defaultValue: number | null,
  errorMessage: string,
): number | null {
  if (!value) return defaultValue
  return parsePositiveInteger(value, errorMessage)
}

export function parseOptionalNumber(
  value: string | undefined,
  errorMessage: string,
): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new Error(errorMessage)
  }
  return parsed
}
