/**
 * Checks whether a value counts as true in a condition.
 *
 * @param value - Evaluated value.
 * @returns False for `false`, `0`, `NaN`, empty string and null.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false
  }
  if (typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'number') {
    return value !== 0 && !Number.isNaN(value)
  }
  if (typeof value === 'string') {
    return value !== ''
  }
  return true
}

/**
 * Converts a value to a number the way mixed-type comparisons do.
 *
 * @param value - Evaluated value.
 * @returns Numeric value, or NaN for objects and non-numeric strings.
 */
export function toNumber(value: unknown): number {
  if (value === null || value === undefined) {
    return 0
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0
  }
  if (typeof value === 'number') {
    return value
  }
  if (typeof value === 'string') {
    let trimmed = value.trim()
    return trimmed === '' ? 0 : Number(trimmed)
  }
  return Number.NaN
}

/**
 * Compares two values for `==`.
 *
 * Values of the same primitive type compare directly, with strings compared
 * case-insensitively. Values of different types are converted to numbers.
 * Objects are only equal to themselves.
 *
 * @param left - Left operand.
 * @param right - Right operand.
 * @returns True when the operands are equal.
 */
export function looseEquals(left: unknown, right: unknown): boolean {
  let normalizedLeft = left ?? null
  let normalizedRight = right ?? null

  if (typeof normalizedLeft === 'object' || typeof normalizedRight === 'object') {
    if (normalizedLeft === null && normalizedRight === null) {
      return true
    }
    if (normalizedLeft !== null && normalizedRight !== null) {
      return normalizedLeft === normalizedRight
    }
  }

  if (
    typeof normalizedLeft === 'string' &&
    typeof normalizedRight === 'string'
  ) {
    return normalizedLeft.toLowerCase() === normalizedRight.toLowerCase()
  }

  if (typeof normalizedLeft === typeof normalizedRight) {
    return normalizedLeft === normalizedRight
  }

  return toNumber(normalizedLeft) === toNumber(normalizedRight)
}

/**
 * Orders two values for `<`, `<=`, `>` and `>=`.
 *
 * @param left - Left operand.
 * @param right - Right operand.
 * @returns Negative, zero or positive like a sort comparator, or NaN when the
 *   operands cannot be ordered.
 */
export function compareValues(left: unknown, right: unknown): number {
  if (typeof left === 'string' && typeof right === 'string') {
    let lower = left.toLowerCase()
    let other = right.toLowerCase()
    if (lower === other) {
      return 0
    }
    return lower < other ? -1 : 1
  }
  return toNumber(left) - toNumber(right)
}

/**
 * Converts a value to the text substituted for a `${{ }}` template.
 *
 * @param value - Evaluated value.
 * @returns Text form; null becomes an empty string.
 */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return String(value)
  }
  return JSON.stringify(value)
}
