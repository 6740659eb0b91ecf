import { ConditionEvaluationError } from '../errors/condition-evaluation-error'

/** Lexical token of an expression. */
export interface ExpressionToken {
  /** Token class. */
  type: 'identifier' | 'punctuator' | 'operator' | 'string' | 'number' | 'end'

  /** Source text, or the decoded value for strings. */
  value: string

  /** Offset in the expression. */
  position: number
}

const OPERATORS = ['==', '!=', '<=', '>=', '&&', '||', '<', '>', '!']

const PUNCTUATORS = new Set(['(', ')', '[', ']', ',', '.'])

/**
 * Splits an expression into tokens.
 *
 * Identifiers may contain dashes so that keys such as `os-type` can be used
 * with dot access. Strings use single quotes, with `''` for a literal quote.
 *
 * @param expression - Expression without the `${{ }}` wrapper.
 * @returns Tokens, terminated by an `end` token.
 */
export function tokenizeExpression(expression: string): ExpressionToken[] {
  let tokens: ExpressionToken[] = []
  let position = 0

  while (position < expression.length) {
    let char = expression.charAt(position)

    if (/\s/u.test(char)) {
      position++
      continue
    }

    if (char === "'") {
      let start = position
      let value = ''
      position++
      for (;;) {
        if (position >= expression.length) {
          throw new ConditionEvaluationError(
            expression,
            `unterminated string at ${start}`,
          )
        }
        let next = expression.charAt(position)
        if (next === "'") {
          if (expression.charAt(position + 1) === "'") {
            value += "'"
            position += 2
            continue
          }
          position++
          break
        }
        value += next
        position++
      }
      tokens.push({ position: start, type: 'string', value })
      continue
    }

    let numberMatch = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?/iu.exec(
      expression.slice(position),
    )
    if (numberMatch && (char !== '-' || !endsWithOperand(tokens))) {
      tokens.push({ value: numberMatch[0], type: 'number', position })
      position += numberMatch[0].length
      continue
    }

    let identifierMatch = /^[_a-z][\w-]*/iu.exec(expression.slice(position))
    if (identifierMatch) {
      tokens.push({ value: identifierMatch[0], type: 'identifier', position })
      position += identifierMatch[0].length
      continue
    }

    let operator = OPERATORS.find(candidate =>
      expression.startsWith(candidate, position),
    )
    if (operator) {
      tokens.push({ value: operator, type: 'operator', position })
      position += operator.length
      continue
    }

    if (PUNCTUATORS.has(char)) {
      tokens.push({ type: 'punctuator', value: char, position })
      position++
      continue
    }

    throw new ConditionEvaluationError(
      expression,
      `unexpected character "${char}" at ${position}`,
    )
  }

  tokens.push({ type: 'end', value: '', position })
  return tokens
}

/**
 * Checks whether the previous token ends an operand, in which case a dash
 * cannot start a negative number.
 *
 * @param tokens - Tokens read so far.
 * @returns True when the last token is a value or a closing bracket.
 */
function endsWithOperand(tokens: ExpressionToken[]): boolean {
  let last = tokens.at(-1)
  if (!last) {
    return false
  }
  return (
    last.type === 'identifier' ||
    last.type === 'number' ||
    last.type === 'string' ||
    (last.type === 'punctuator' && (last.value === ')' || last.value === ']'))
  )
}
