import type { ExpressionToken } from './tokenize-expression'
import type { ExpressionNode } from './expression-node'

import { ConditionEvaluationError } from '../errors/condition-evaluation-error'
import { tokenizeExpression } from './tokenize-expression'

/**
 * Parses an expression into a tree.
 *
 * Precedence from loosest to tightest: `||`, `&&`, `==` `!=`, `<` `<=` `>`
 * `>=`, `!`, then property access, indexing and calls.
 *
 * @param expression - Expression without the `${{ }}` wrapper.
 * @returns Root node.
 * @throws {ConditionEvaluationError} When the expression is malformed.
 */
export function parseExpression(expression: string): ExpressionNode {
  let tokens = tokenizeExpression(expression)
  let cursor = 0

  function peek(): ExpressionToken {
    return tokens[cursor] ?? { type: 'end', value: '', position: 0 }
  }

  function fail(reason: string): never {
    throw new ConditionEvaluationError(expression, reason)
  }

  function accept(type: ExpressionToken['type'], value: string): boolean {
    let token = peek()
    if (token.type === type && token.value === value) {
      cursor++
      return true
    }
    return false
  }

  function expect(type: ExpressionToken['type'], value: string): void {
    if (!accept(type, value)) {
      let token = peek()
      fail(
        `expected "${value}" at ${token.position}, found ${
          token.type === 'end' ? 'end of expression' : `"${token.value}"`
        }`,
      )
    }
  }

  function parseOr(): ExpressionNode {
    let left = parseAnd()
    while (accept('operator', '||')) {
      left = { right: parseAnd(), type: 'logical', operator: '||', left }
    }
    return left
  }

  function parseAnd(): ExpressionNode {
    let left = parseEquality()
    while (accept('operator', '&&')) {
      left = { right: parseEquality(), type: 'logical', operator: '&&', left }
    }
    return left
  }

  function parseEquality(): ExpressionNode {
    let left = parseComparison()
    for (;;) {
      let token = peek()
      if (
        token.type !== 'operator' ||
        (token.value !== '==' && token.value !== '!=')
      ) {
        return left
      }
      cursor++
      left = {
        right: parseComparison(),
        operator: token.value,
        type: 'comparison',
        left,
      }
    }
  }

  function parseComparison(): ExpressionNode {
    let left = parseUnary()
    for (;;) {
      let token = peek()
      if (
        token.type !== 'operator' ||
        (token.value !== '<' &&
          token.value !== '<=' &&
          token.value !== '>' &&
          token.value !== '>=')
      ) {
        return left
      }
      cursor++
      left = {
        operator: token.value,
        right: parseUnary(),
        type: 'comparison',
        left,
      }
    }
  }

  function parseUnary(): ExpressionNode {
    if (accept('operator', '!')) {
      return { operand: parseUnary(), type: 'not' }
    }
    return parsePostfix()
  }

  function parsePostfix(): ExpressionNode {
    let node = parsePrimary()
    for (;;) {
      if (accept('punctuator', '.')) {
        let token = peek()
        if (token.type !== 'identifier') {
          fail(`expected property name at ${token.position}`)
        }
        cursor++
        node = {
          key: { value: token.value, type: 'literal' },
          type: 'index',
          object: node,
        }
      } else if (accept('punctuator', '[')) {
        let key = parseOr()
        expect('punctuator', ']')
        node = { type: 'index', object: node, key }
      } else {
        return node
      }
    }
  }

  function parsePrimary(): ExpressionNode {
    let token = peek()

    switch (token.type) {
      case 'identifier': {
        cursor++
        if (accept('punctuator', '(')) {
          let parameters: ExpressionNode[] = []
          if (!accept('punctuator', ')')) {
            do {
              parameters.push(parseOr())
            } while (accept('punctuator', ','))
            expect('punctuator', ')')
          }
          return {
            name: token.value.toLowerCase(),
            arguments: parameters,
            type: 'call',
          }
        }
        let lower = token.value.toLowerCase()
        if (lower === 'true' || lower === 'false') {
          return { value: lower === 'true', type: 'literal' }
        }
        if (lower === 'null') {
          return { type: 'literal', value: null }
        }
        return { type: 'context', name: lower }
      }
      case 'punctuator': {
        if (token.value === '(') {
          cursor++
          let inner = parseOr()
          expect('punctuator', ')')
          return inner
        }
        return fail(`unexpected "${token.value}" at ${token.position}`)
      }
      case 'string':
        cursor++
        return { value: token.value, type: 'literal' }
      case 'number':
        cursor++
        return { value: Number(token.value), type: 'literal' }
      case 'operator':
        return fail(`unexpected "${token.value}" at ${token.position}`)
      case 'end':
        return fail('unexpected end of expression')
    }
  }

  let root = parseOr()
  let rest = peek()
  if (rest.type !== 'end') {
    fail(`unexpected "${rest.value}" at ${rest.position}`)
  }
  return root
}
