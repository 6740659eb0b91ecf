import type { ExpressionContext } from '../../types/expression-context'
import type { ExpressionNode } from './expression-node'

import {
  stringifyValue,
  compareValues,
  looseEquals,
  isTruthy,
} from './coerce-value'
import { ConditionEvaluationError } from '../errors/condition-evaluation-error'

/** Functions that read the job status. */
export const STATUS_FUNCTIONS = new Set([
  'cancelled',
  'success',
  'failure',
  'always',
])

/**
 * Evaluates a parsed expression against a job context.
 *
 * Context and property names are case-insensitive. Accessing a missing
 * property yields null.
 *
 * @param node - Parsed expression.
 * @param context - Values visible to the expression.
 * @param source - Original expression text, used in error messages.
 * @returns Value of the expression.
 * @throws {ConditionEvaluationError} For unknown contexts or functions and for
 *   calls with the wrong number of arguments.
 */
export function evaluateExpression(
  node: ExpressionNode,
  context: ExpressionContext,
  source: string,
): unknown {
  function fail(reason: string): never {
    throw new ConditionEvaluationError(source, reason)
  }

  function visit(current: ExpressionNode): unknown {
    switch (current.type) {
      case 'literal':
        return current.value
      case 'context': {
        let value = readProperty(context, current.name)
        if (value === null) {
          fail(`unknown context "${current.name}"`)
        }
        return value
      }
      case 'index':
        return readProperty(visit(current.object), visit(current.key))
      case 'not':
        return !isTruthy(visit(current.operand))
      case 'logical': {
        let left = visit(current.left)
        if (current.operator === '&&') {
          return isTruthy(left) ? visit(current.right) : left
        }
        return isTruthy(left) ? left : visit(current.right)
      }
      case 'comparison':
        return compare(
          current.operator,
          visit(current.left),
          visit(current.right),
        )
      case 'call':
        return call(
          current.name,
          current.arguments.map(argument => visit(argument)),
        )
    }
  }

  function call(name: string, parameters: unknown[]): unknown {
    function arity(min: number, max: number = min): void {
      if (parameters.length < min || parameters.length > max) {
        let expected = min === max ? String(min) : `${min} to ${max}`
        fail(`${name}() takes ${expected} arguments`)
      }
    }

    switch (name) {
      case 'success':
        arity(0)
        return context.job.status === 'success'
      case 'failure':
        arity(0)
        return context.job.status === 'failure'
      case 'cancelled':
        arity(0)
        return context.job.status === 'cancelled'
      case 'always':
        arity(0)
        return true
      case 'contains': {
        arity(2)
        let [search, item] = parameters
        if (Array.isArray(search)) {
          return search.some((element: unknown) => looseEquals(element, item))
        }
        return stringifyValue(search)
          .toLowerCase()
          .includes(stringifyValue(item).toLowerCase())
      }
      case 'startswith': {
        arity(2)
        let [text, prefix] = parameters.map(value =>
          stringifyValue(value).toLowerCase(),
        )
        return (text ?? '').startsWith(prefix ?? '')
      }
      case 'endswith': {
        arity(2)
        let [text, suffix] = parameters.map(value =>
          stringifyValue(value).toLowerCase(),
        )
        return (text ?? '').endsWith(suffix ?? '')
      }
      case 'format': {
        arity(1, Infinity)
        let [template, ...values] = parameters
        return stringifyValue(template).replaceAll(
          /\{\{|\}\}|\{(?<index>\d+)\}/gu,
          (match, index: string | undefined) => {
            if (index === undefined) {
              return match[0] ?? ''
            }
            let position = Number(index)
            return position < values.length
              ? stringifyValue(values[position])
              : match
          },
        )
      }
      case 'join': {
        arity(1, 2)
        let [items, separator] = parameters
        let glue = separator === undefined ? ',' : stringifyValue(separator)
        return Array.isArray(items)
          ? items.map((item: unknown) => stringifyValue(item)).join(glue)
          : stringifyValue(items)
      }
      default:
        return fail(`unknown function "${name}()"`)
    }
  }

  return visit(node)
}

/**
 * Collects the names of status functions called anywhere in an expression.
 *
 * @param node - Parsed expression.
 * @returns True when `success()`, `failure()`, `cancelled()` or `always()` is
 *   called.
 */
export function callsStatusFunction(node: ExpressionNode): boolean {
  switch (node.type) {
    case 'call':
      return (
        STATUS_FUNCTIONS.has(node.name) ||
        node.arguments.some(argument => callsStatusFunction(argument))
      )
    case 'comparison':
    case 'logical':
      return callsStatusFunction(node.left) || callsStatusFunction(node.right)
    case 'index':
      return callsStatusFunction(node.object) || callsStatusFunction(node.key)
    case 'not':
      return callsStatusFunction(node.operand)
    case 'literal':
    case 'context':
      return false
  }
}

/**
 * Applies an equality or ordering operator.
 *
 * @param operator - Comparison operator.
 * @param left - Left operand.
 * @param right - Right operand.
 * @returns Result of the comparison.
 */
function compare(
  operator: '==' | '!=' | '<=' | '>=' | '<' | '>',
  left: unknown,
  right: unknown,
): boolean {
  switch (operator) {
    case '==':
      return looseEquals(left, right)
    case '!=':
      return !looseEquals(left, right)
    case '<':
      return compareValues(left, right) < 0
    case '<=':
      return compareValues(left, right) <= 0
    case '>':
      return compareValues(left, right) > 0
    case '>=':
      return compareValues(left, right) >= 0
  }
}

/**
 * Reads a property from an object or an element from an array.
 *
 * @param target - Object or array to read from.
 * @param key - Property name or array index.
 * @returns Property value, or null when it does not exist.
 */
function readProperty(target: unknown, key: unknown): unknown {
  if (Array.isArray(target)) {
    let index = typeof key === 'number' ? key : Number.NaN
    return Number.isInteger(index) ? (target[index] ?? null) : null
  }

  if (target === null || typeof target !== 'object') {
    return null
  }

  let name = stringifyValue(key)
  let entries: [string, unknown][] = Object.entries(target)
  let lower = name.toLowerCase()
  let match =
    entries.find(([candidate]) => candidate === name) ??
    entries.find(([candidate]) => candidate.toLowerCase() === lower)
  return match?.[1] ?? null
}
